// packages/core/src/java/snapshot.ts — Indexed, read-only view over one read of the project sources

import type Parser from 'web-tree-sitter';
import type { CallExpression, FileSymbols, ModelSnapshot, ReferenceSite } from '../types/model.js';
import type {
  ClassSymbol,
  CodeSymbol,
  FieldSymbol,
  ImportSymbol,
  MethodSymbol,
  Modifier,
} from '../types/symbols.js';
import type { Logger } from '../utils/logger.js';
import { declarationsOf, type UnitDeclarations } from './declarations.js';
import {
  JavaSyntaxError,
  parseJava,
  scanNames,
  type NameUse,
  type ParsedMethod,
  type ParsedType,
  type ParsedUnit,
} from './parser.js';

export interface SourceFile {
  file: string;
  source: string;
}

export interface SnapshotOptions {
  parser: Parser;
  /** Treat methods of types with a supertype outside the project as overrides. */
  externalSupertypesAreOverrides: boolean;
  logger: Logger;
}

const OBJECT_METHODS = new Set(['toString/0', 'hashCode/0', 'equals/1', 'clone/0', 'finalize/0']);

interface Occurrence {
  file: string;
  use: NameUse;
  enclosingMethod: string | null;
}

interface TypeInfo {
  symbol: ClassSymbol;
  parsed: ParsedType;
  outer: TypeInfo | null;
  methods: MethodSymbol[];
}

interface MethodInfo {
  symbol: MethodSymbol;
  file: string;
  parsed: ParsedMethod;
}

interface UnitIndex {
  symbols: FileSymbols;
  typeSpans: { start: number; end: number; info: TypeInfo }[];
}

function simpleName(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

function arityMatches(method: MethodSymbol, count: number): boolean {
  return method.isVarArgs ? count >= method.parameterCount - 1 : count === method.parameterCount;
}

function single<T>(items: readonly T[]): T | null {
  return items.length === 1 ? items[0] : null;
}

function uniqueByIdentity(methods: readonly MethodSymbol[]): MethodSymbol[] {
  const seen = new Map<string, MethodSymbol>();
  for (const method of methods) seen.set(method.identity, method);
  return [...seen.values()];
}

function isInterfaceLike(type: ParsedType): boolean {
  return type.kind === 'interface' || type.kind === 'annotation';
}

function methodModifiers(method: ParsedMethod, owner: ParsedType): Modifier[] {
  const modifiers = [...method.modifiers];
  if (isInterfaceLike(owner) && !modifiers.includes('private')) {
    if (!modifiers.includes('public')) modifiers.push('public');
    const concrete = modifiers.includes('static') || modifiers.includes('default');
    if (!concrete && method.body === null && !modifiers.includes('abstract')) modifiers.push('abstract');
  }
  return modifiers;
}

function fieldModifiers(modifiers: readonly Modifier[], owner: ParsedType): Modifier[] {
  const result = [...modifiers];
  if (isInterfaceLike(owner)) {
    for (const implicit of ['public', 'static', 'final'] as const) {
      if (!result.includes(implicit)) result.push(implicit);
    }
  }
  return result;
}

export class JavaSnapshot implements ModelSnapshot {
  private readonly files: string[];
  private readonly units = new Map<string, UnitIndex>();
  private readonly typeInfos = new Map<ParsedType, TypeInfo>();
  private readonly typesBySimpleName = new Map<string, TypeInfo[]>();
  private readonly methods = new Map<string, MethodInfo>();
  private readonly symbols = new Map<string, CodeSymbol>();
  private readonly occurrences = new Map<string, Occurrence[]>();

  constructor(
    sources: readonly SourceFile[],
    private readonly options: SnapshotOptions,
  ) {
    this.files = sources.map((s) => s.file).sort();

    const parsed: { file: string; unit: ParsedUnit | null; names: NameUse[]; declarations: UnitDeclarations | null }[] = [];
    for (const { file, source } of sources) {
      try {
        const unit = parseJava(options.parser, source);
        parsed.push({ file, unit, names: unit.names, declarations: declarationsOf(file, unit) });
      } catch (err) {
        if (!(err instanceof JavaSyntaxError)) throw err;
        // Declarations are lost, but every name in the file still counts as a reference.
        options.logger.warn(`No declarations read from ${file}: ${err.message}`);
        parsed.push({ file, unit: null, names: scanNames(options.parser, source), declarations: null });
      }
    }

    // All types first, so supertypes in any file resolve.
    for (const entry of parsed) {
      if (entry.declarations) this.indexTypes(entry.file, entry.declarations);
    }
    for (const entry of parsed) {
      this.indexUnit(entry.file, entry.unit, entry.names, entry.declarations);
    }
  }

  // ── ModelSnapshot ──

  listFiles(): string[] {
    return [...this.files];
  }

  getSymbols(file: string): FileSymbols {
    return (
      this.units.get(file)?.symbols ?? {
        file,
        packageName: null,
        classes: [],
        methods: [],
        fields: [],
        imports: [],
      }
    );
  }

  findSymbol(identity: string): CodeSymbol | null {
    return this.symbols.get(identity) ?? null;
  }

  findReferences(symbol: CodeSymbol): ReferenceSite[] {
    const candidates = this.occurrences.get(symbol.name) ?? [];
    return candidates
      .filter((occurrence) => this.refersTo(occurrence, symbol))
      .map((occurrence) => ({
        target: symbol.identity,
        file: occurrence.file,
        line: occurrence.use.line,
        column: occurrence.use.column,
        referencingMethod: occurrence.enclosingMethod,
      }));
  }

  callExpressionsIn(method: MethodSymbol): CallExpression[] {
    const info = this.methods.get(method.identity);
    if (!info) return [];
    return info.parsed.calls.map((call) => ({ ...call, file: info.file, enclosingMethod: method.identity }));
  }

  resolveCallTarget(call: CallExpression): MethodSymbol | null {
    const unit = this.units.get(call.file);
    if (!unit) return null;
    const scope = this.innermostType(unit, call.offset);
    const fits = (m: MethodSymbol): boolean => call.argumentCount === null || arityMatches(m, call.argumentCount);

    const { qualifier, name } = call;
    if (qualifier === null || qualifier === 'this') {
      for (let type = scope; type; type = type.outer) {
        const named = this.hierarchyMethods(type, name, false);
        if (named.length > 0) return single(named.filter(fits));
      }
      // statically imported, or inherited from outside the project
      return qualifier === null ? this.uniqueProjectMethod(name, fits) : null;
    }
    if (qualifier === 'super') {
      return scope ? single(this.hierarchyMethods(scope, name, true).filter(fits)) : null;
    }
    const types = this.typesBySimpleName.get(qualifier);
    if (types && /^[A-Z]/.test(qualifier)) {
      const named = uniqueByIdentity(types.flatMap((type) => this.hierarchyMethods(type, name, false)));
      return single(named.filter(fits));
    }
    return this.uniqueProjectMethod(name, fits);
  }

  // ── Resolution ──

  private innermostType(unit: UnitIndex, offset: number): TypeInfo | null {
    let best: { start: number; info: TypeInfo } | null = null;
    for (const span of unit.typeSpans) {
      if (span.start <= offset && offset < span.end && (!best || span.start > best.start)) best = span;
    }
    return best?.info ?? null;
  }

  private superTypesOf(type: TypeInfo): { resolved: TypeInfo[]; external: boolean } {
    const resolved: TypeInfo[] = [];
    let external = false;
    for (const superName of type.parsed.superTypes) {
      if (superName === 'Object') continue;
      const candidates = (this.typesBySimpleName.get(superName) ?? []).filter((t) => t !== type);
      if (candidates.length === 0) external = true;
      resolved.push(...candidates);
    }
    return { resolved, external };
  }

  /** Walk `start` and everything above it, breadth first. */
  private ancestors(start: TypeInfo, includeSelf: boolean): { types: TypeInfo[]; external: boolean } {
    const visited = new Set<TypeInfo>([start]);
    const types: TypeInfo[] = includeSelf ? [start] : [];
    let external = false;
    const queue = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      const supers = this.superTypesOf(current);
      if (supers.external) external = true;
      for (const superType of supers.resolved) {
        if (visited.has(superType)) continue;
        visited.add(superType);
        types.push(superType);
        queue.push(superType);
      }
    }
    return { types, external };
  }

  private hierarchyMethods(start: TypeInfo, name: string, skipSelf: boolean): MethodSymbol[] {
    const { types } = this.ancestors(start, !skipSelf);
    return uniqueByIdentity(types.flatMap((t) => t.methods.filter((m) => m.name === name && !m.isConstructor)));
  }

  private uniqueProjectMethod(name: string, fits: (m: MethodSymbol) => boolean): MethodSymbol | null {
    const matches: MethodSymbol[] = [];
    for (const { symbol } of this.methods.values()) {
      if (symbol.name === name && !symbol.isConstructor && fits(symbol)) matches.push(symbol);
    }
    return single(matches);
  }

  private overrides(method: ParsedMethod, owner: TypeInfo): boolean {
    if (method.isConstructor) return false;
    if (method.annotations.some((a) => simpleName(a) === 'Override')) return true;
    if (method.modifiers.includes('static') || method.modifiers.includes('private')) return false;

    const arity = method.parameterTypes.length;
    if (OBJECT_METHODS.has(`${method.name}/${arity}`)) return true;

    const { types, external } = this.ancestors(owner, false);
    const declaredAbove = types.some((t) =>
      t.parsed.methods.some((m) => !m.isConstructor && m.name === method.name && m.parameterTypes.length === arity),
    );
    if (declaredAbove) return true;
    return this.options.externalSupertypesAreOverrides && external;
  }

  private refersTo(occurrence: Occurrence, symbol: CodeSymbol): boolean {
    const { use } = occurrence;
    switch (symbol.kind) {
      case 'method': {
        if (use.declaration) return false;
        if (use.context === 'static-member') return true;
        if (use.context !== 'code') return false;
        if (use.role === 'method-reference') return true;
        return use.role === 'call' && use.argumentCount !== null && arityMatches(symbol, use.argumentCount);
      }
      case 'field': {
        if (use.declaration) return false;
        if (symbol.modifiers.includes('private') && occurrence.file !== symbol.file) return false;
        if (use.context === 'static-member') return true;
        return use.context === 'code' && use.role === 'name';
      }
      case 'class':
        return !use.declaration && use.context !== 'package';
      case 'import':
        return occurrence.file === symbol.file && use.context === 'code';
    }
  }

  // ── Indexing ──

  private indexTypes(file: string, declarations: UnitDeclarations): void {
    for (const declaration of declarations.types) {
      const { parsed, outer } = declaration;
      const outerInfo = outer ? (this.typeInfos.get(outer) ?? null) : null;
      const symbol: ClassSymbol = {
        kind: 'class',
        identity: declaration.identity,
        name: parsed.name,
        qualifiedName: parsed.qualifiedName,
        file,
        containingClass: outer?.qualifiedName ?? null,
        modifiers: parsed.modifiers,
        annotations: parsed.annotations,
        hasDocDeprecatedTag: parsed.docDeprecated,
        line: parsed.line,
        classKind: parsed.kind,
        methodCount: parsed.methods.length,
        fieldCount: parsed.fields.length + parsed.enumConstantCount,
        nestedClassCount: parsed.types.length,
      };
      const info: TypeInfo = { symbol, parsed, outer: outerInfo, methods: [] };
      this.typeInfos.set(parsed, info);
      this.symbols.set(symbol.identity, symbol);
      const sameName = this.typesBySimpleName.get(parsed.name);
      if (sameName) sameName.push(info);
      else this.typesBySimpleName.set(parsed.name, [info]);
    }
  }

  private indexUnit(file: string, unit: ParsedUnit | null, names: readonly NameUse[], declarations: UnitDeclarations | null): void {
    const symbols: FileSymbols = {
      file,
      packageName: unit?.packageName ?? null,
      classes: [],
      methods: [],
      fields: [],
      imports: [],
    };
    const typeSpans: UnitIndex['typeSpans'] = [];
    const methodIdentities = new Map<ParsedMethod, string>();

    if (declarations) {
      for (const declaration of declarations.types) {
        const info = this.typeInfos.get(declaration.parsed);
        if (!info) continue;
        symbols.classes.push(info.symbol);
        typeSpans.push({ start: declaration.parsed.start, end: declaration.parsed.end, info });
      }

      for (const declaration of declarations.methods) {
        const { parsed, owner } = declaration;
        const ownerInfo = this.typeInfos.get(owner);
        if (!ownerInfo) continue;
        const symbol: MethodSymbol = {
          kind: 'method',
          identity: declaration.identity,
          name: parsed.name,
          qualifiedName: `${owner.qualifiedName}.${parsed.name}`,
          file,
          containingClass: owner.qualifiedName,
          modifiers: methodModifiers(parsed, owner),
          annotations: parsed.annotations,
          hasDocDeprecatedTag: parsed.docDeprecated,
          line: parsed.line,
          parameterCount: parsed.parameterTypes.length,
          isVarArgs: parsed.isVarArgs,
          isConstructor: parsed.isConstructor,
          declaredInInterface: isInterfaceLike(owner),
          overrides: this.overrides(parsed, ownerInfo),
        };
        ownerInfo.methods.push(symbol);
        symbols.methods.push(symbol);
        this.symbols.set(symbol.identity, symbol);
        this.methods.set(symbol.identity, { symbol, file, parsed });
        methodIdentities.set(parsed, symbol.identity);
      }

      for (const declaration of declarations.fields) {
        const { parsed, owner } = declaration;
        const symbol: FieldSymbol = {
          kind: 'field',
          identity: declaration.identity,
          name: parsed.name,
          qualifiedName: `${owner.qualifiedName}.${parsed.name}`,
          file,
          containingClass: owner.qualifiedName,
          modifiers: fieldModifiers(parsed.modifiers, owner),
          annotations: parsed.annotations,
          hasDocDeprecatedTag: parsed.docDeprecated,
          line: parsed.line,
        };
        symbols.fields.push(symbol);
        this.symbols.set(symbol.identity, symbol);
      }

      for (const declaration of declarations.imports) {
        const { parsed } = declaration;
        const symbol: ImportSymbol = {
          kind: 'import',
          identity: declaration.identity,
          name: parsed.isWildcard ? '*' : simpleName(parsed.qualifiedName),
          qualifiedName: parsed.qualifiedName,
          file,
          containingClass: null,
          modifiers: [],
          annotations: [],
          hasDocDeprecatedTag: false,
          line: parsed.line,
          isStatic: parsed.isStatic,
          isWildcard: parsed.isWildcard,
        };
        symbols.imports.push(symbol);
        this.symbols.set(symbol.identity, symbol);
      }
    }

    this.units.set(file, { symbols, typeSpans });
    for (const use of names) {
      const occurrence: Occurrence = {
        file,
        use,
        enclosingMethod: use.method ? (methodIdentities.get(use.method) ?? null) : null,
      };
      const list = this.occurrences.get(use.text);
      if (list) list.push(occurrence);
      else this.occurrences.set(use.text, [occurrence]);
    }
  }
}
