// packages/core/src/java/index.ts -- barrel re-export

export { countArguments, readCall, receiverName } from './calls.js';
export type { ParsedCall } from './calls.js';
export {
  classIdentity,
  declarationsOf,
  fieldIdentity,
  identityKind,
  importIdentity,
  locateDeclaration,
  methodIdentity,
} from './declarations.js';
export type { Span, UnitDeclarations } from './declarations.js';
export { removeDeclaration, spliceOut } from './edits.js';
export { loadJavaParser } from './grammar.js';
export { JavaCodeModel } from './java-model.js';
export type { JavaCodeModelOptions } from './java-model.js';
export { flattenTypes, JavaSyntaxError, parseJava, scanNames } from './parser.js';
export type { NameUse, ParsedField, ParsedImport, ParsedMethod, ParsedType, ParsedUnit } from './parser.js';
export { JavaSnapshot } from './snapshot.js';
export type { SnapshotOptions, SourceFile } from './snapshot.js';
export { FileSystemSourceStore, MemorySourceStore } from './source-store.js';
export type { SourceStore } from './source-store.js';
