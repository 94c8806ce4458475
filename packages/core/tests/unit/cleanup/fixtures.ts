// tests/unit/cleanup/fixtures.ts — hand-built symbols for classifier and planner tests

import type { ClassSymbol, FieldSymbol, ImportSymbol, MethodSymbol } from '../../../src/types/symbols.js';

export function methodSymbol(name: string, overrides: Partial<MethodSymbol> = {}): MethodSymbol {
  const owner = overrides.containingClass ?? 'app.OrderController';
  const file = overrides.file ?? 'src/OrderController.java';
  return {
    kind: 'method',
    identity: `method:${file}#${owner}.${name}()`,
    name,
    qualifiedName: `${owner}.${name}`,
    file,
    containingClass: owner,
    modifiers: ['public'],
    annotations: [],
    hasDocDeprecatedTag: false,
    line: 1,
    parameterCount: 0,
    isVarArgs: false,
    isConstructor: false,
    declaredInInterface: false,
    overrides: false,
    ...overrides,
  };
}

export function fieldSymbol(name: string, overrides: Partial<FieldSymbol> = {}): FieldSymbol {
  const file = overrides.file ?? 'src/Holder.java';
  return {
    kind: 'field',
    identity: `field:${file}#app.Holder.${name}`,
    name,
    qualifiedName: `app.Holder.${name}`,
    file,
    containingClass: 'app.Holder',
    modifiers: ['private', 'final'],
    annotations: [],
    hasDocDeprecatedTag: false,
    line: 1,
    ...overrides,
  };
}

export function importSymbol(qualifiedName: string, overrides: Partial<ImportSymbol> = {}): ImportSymbol {
  const file = overrides.file ?? 'src/Holder.java';
  return {
    kind: 'import',
    identity: `import:${file}#${qualifiedName}`,
    name: qualifiedName.slice(qualifiedName.lastIndexOf('.') + 1),
    qualifiedName,
    file,
    containingClass: null,
    modifiers: [],
    annotations: [],
    hasDocDeprecatedTag: false,
    line: 1,
    isStatic: false,
    isWildcard: false,
    ...overrides,
  };
}

export function classSymbol(name: string, overrides: Partial<ClassSymbol> = {}): ClassSymbol {
  const file = overrides.file ?? `src/${name}.java`;
  return {
    kind: 'class',
    identity: `class:${file}#app.${name}`,
    name,
    qualifiedName: `app.${name}`,
    file,
    containingClass: null,
    modifiers: [],
    annotations: [],
    hasDocDeprecatedTag: false,
    line: 1,
    classKind: 'class',
    methodCount: 0,
    fieldCount: 0,
    nestedClassCount: 0,
    ...overrides,
  };
}
