// packages/core/src/types/model.ts — Code model provider contract

import type { ClassSymbol, CodeSymbol, FieldSymbol, ImportSymbol, MethodSymbol } from './symbols.js';

export interface ReferenceSite {
  /** Identity of the referenced symbol. */
  target: string;
  file: string;
  line: number;
  column: number;
  /** Identity of the method whose body contains the site, or null. */
  referencingMethod: string | null;
}

export interface CallExpression {
  file: string;
  name: string;
  /** Text of the receiver token (`this`, `super`, `Util`, `repo`), null when unqualified. */
  qualifier: string | null;
  /** Null for method references (`Foo::bar`), whose arity is not known at the site. */
  argumentCount: number | null;
  line: number;
  offset: number;
  enclosingMethod: string | null;
}

export interface FileSymbols {
  file: string;
  packageName: string | null;
  classes: ClassSymbol[];
  methods: MethodSymbol[];
  fields: FieldSymbol[];
  imports: ImportSymbol[];
}

/** Read-only view of the project at one point in time. */
export interface ModelSnapshot {
  listFiles(): string[];
  getSymbols(file: string): FileSymbols;
  findReferences(symbol: CodeSymbol): ReferenceSite[];
  callExpressionsIn(method: MethodSymbol): CallExpression[];
  resolveCallTarget(call: CallExpression): MethodSymbol | null;
  findSymbol(identity: string): CodeSymbol | null;
}

export interface CodeModelProvider {
  /** Always re-reads; snapshots are never reused across mutations. */
  readSnapshot(): Promise<ModelSnapshot>;
  /** Throws StaleSymbolError when the identity no longer resolves, MutationError otherwise. */
  delete(symbol: CodeSymbol): Promise<void>;
}
