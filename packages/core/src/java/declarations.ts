// packages/core/src/java/declarations.ts — Stable identities and source spans for parsed declarations

import type { SymbolKind } from '../types/symbols.js';
import {
  flattenTypes,
  type ParsedField,
  type ParsedImport,
  type ParsedMethod,
  type ParsedType,
  type ParsedUnit,
} from './parser.js';

/**
 * Source range to delete. `wholeLines` spans cover complete declarations and
 * are tidied by `removeDeclaration`; the rest are spliced verbatim.
 */
export interface Span {
  start: number;
  end: number;
  wholeLines: boolean;
}

export interface TypeDeclaration {
  identity: string;
  parsed: ParsedType;
  outer: ParsedType | null;
  span: Span;
}

export interface MethodDeclaration {
  identity: string;
  parsed: ParsedMethod;
  owner: ParsedType;
  span: Span;
}

export interface FieldDeclaration {
  identity: string;
  parsed: ParsedField;
  owner: ParsedType;
  span: Span;
}

export interface ImportDeclaration {
  identity: string;
  parsed: ParsedImport;
  span: Span;
}

export interface UnitDeclarations {
  types: TypeDeclaration[];
  methods: MethodDeclaration[];
  fields: FieldDeclaration[];
  imports: ImportDeclaration[];
}

export function classIdentity(file: string, qualifiedName: string): string {
  return `class:${file}#${qualifiedName}`;
}

export function methodIdentity(file: string, owner: string, name: string, parameterTypes: readonly string[]): string {
  return `method:${file}#${owner}.${name}(${parameterTypes.join(',')})`;
}

export function fieldIdentity(file: string, owner: string, name: string): string {
  return `field:${file}#${owner}.${name}`;
}

export function importIdentity(file: string, parsed: Pick<ParsedImport, 'qualifiedName' | 'isStatic' | 'isWildcard'>): string {
  return `import:${file}#${parsed.isStatic ? 'static ' : ''}${parsed.qualifiedName}${parsed.isWildcard ? '.*' : ''}`;
}

export function identityKind(identity: string): SymbolKind | null {
  const kind = identity.slice(0, identity.indexOf(':'));
  return kind === 'method' || kind === 'field' || kind === 'import' || kind === 'class' ? kind : null;
}

function fieldSpan(field: ParsedField): Span {
  const { declaration, declaratorIndex } = field;
  const declarators = declaration.declarators;
  if (declarators.length === 1) {
    return { start: declaration.start, end: declaration.end, wholeLines: true };
  }
  if (declaratorIndex === 0) {
    // `int a = 1, b;` -> `int b;`
    return { start: declarators[0].start, end: declarators[1].start, wholeLines: false };
  }
  // `int a, b = 2;` -> `int a;`
  return { start: declarators[declaratorIndex - 1].end, end: declarators[declaratorIndex].end, wholeLines: false };
}

export function declarationsOf(file: string, unit: ParsedUnit): UnitDeclarations {
  const result: UnitDeclarations = { types: [], methods: [], fields: [], imports: [] };

  for (const parsed of unit.imports) {
    result.imports.push({
      identity: importIdentity(file, parsed),
      parsed,
      span: { start: parsed.start, end: parsed.end, wholeLines: true },
    });
  }

  const outerOf = new Map<ParsedType, ParsedType>();
  for (const type of flattenTypes(unit.types)) {
    for (const member of type.types) outerOf.set(member, type);
  }

  for (const type of flattenTypes(unit.types)) {
    result.types.push({
      identity: classIdentity(file, type.qualifiedName),
      parsed: type,
      outer: outerOf.get(type) ?? null,
      span: { start: type.start, end: type.end, wholeLines: true },
    });
    for (const method of type.methods) {
      result.methods.push({
        identity: methodIdentity(file, type.qualifiedName, method.name, method.parameterTypes),
        parsed: method,
        owner: type,
        span: { start: method.start, end: method.end, wholeLines: true },
      });
    }
    for (const field of type.fields) {
      result.fields.push({
        identity: fieldIdentity(file, type.qualifiedName, field.name),
        parsed: field,
        owner: type,
        span: fieldSpan(field),
      });
    }
  }

  return result;
}

/** Span of the declaration with `identity` in a freshly parsed unit, or null when it is gone. */
export function locateDeclaration(file: string, unit: ParsedUnit, identity: string): Span | null {
  const declarations = declarationsOf(file, unit);
  const all = [...declarations.imports, ...declarations.types, ...declarations.methods, ...declarations.fields];
  return all.find((declaration) => declaration.identity === identity)?.span ?? null;
}
