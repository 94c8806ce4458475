// packages/core/src/types/symbols.ts — Code symbols the engine reasons about

export type SymbolKind = 'method' | 'field' | 'import' | 'class';

export type Modifier =
  | 'public'
  | 'protected'
  | 'private'
  | 'static'
  | 'final'
  | 'abstract'
  | 'default'
  | 'native'
  | 'synchronized'
  | 'transient'
  | 'volatile'
  | 'strictfp'
  | 'sealed'
  | 'non-sealed';

export type ClassKind = 'class' | 'interface' | 'enum' | 'record' | 'annotation';

interface SymbolBase {
  /** Stable across re-reads: kind, file and qualified name (plus signature for methods). */
  identity: string;
  name: string;
  qualifiedName: string;
  /** Project-relative path, forward slashes. */
  file: string;
  /** Qualified name of the declaring class; null for imports and top-level classes. */
  containingClass: string | null;
  modifiers: readonly Modifier[];
  /** Annotation names as written in source, simple or qualified. */
  annotations: readonly string[];
  hasDocDeprecatedTag: boolean;
  line: number;
}

export interface MethodSymbol extends SymbolBase {
  kind: 'method';
  parameterCount: number;
  isVarArgs: boolean;
  isConstructor: boolean;
  declaredInInterface: boolean;
  overrides: boolean;
}

export interface FieldSymbol extends SymbolBase {
  kind: 'field';
}

export interface ImportSymbol extends SymbolBase {
  kind: 'import';
  isStatic: boolean;
  isWildcard: boolean;
}

export interface ClassSymbol extends SymbolBase {
  kind: 'class';
  classKind: ClassKind;
  methodCount: number;
  fieldCount: number;
  nestedClassCount: number;
}

export type CodeSymbol = MethodSymbol | FieldSymbol | ImportSymbol | ClassSymbol;

/** Short human label, e.g. `OrderController.legacy(2)` or `import java.io.File`. */
export function describeSymbol(symbol: CodeSymbol): string {
  switch (symbol.kind) {
    case 'method': {
      const owner = symbol.containingClass?.split('.').pop() ?? '';
      return `${owner}.${symbol.name}(${symbol.parameterCount})`;
    }
    case 'field': {
      const owner = symbol.containingClass?.split('.').pop() ?? '';
      return `${owner}.${symbol.name}`;
    }
    case 'import':
      return `import ${symbol.isStatic ? 'static ' : ''}${symbol.qualifiedName}${symbol.isWildcard ? '.*' : ''}`;
    case 'class':
      return symbol.qualifiedName;
  }
}
