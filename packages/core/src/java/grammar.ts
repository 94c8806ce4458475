// packages/core/src/java/grammar.ts — web-tree-sitter runtime with the Java grammar from tree-sitter-wasms

import { createRequire } from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';

// Resolve the grammar from the installed tree-sitter-wasms package
const require = createRequire(import.meta.url);

const JAVA_WASM = 'tree-sitter-java.wasm';

let loading: Promise<Parser> | null = null;

async function createJavaParser(): Promise<Parser> {
  await Parser.init();
  const parser = new Parser();
  try {
    const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
    const language = await Parser.Language.load(path.join(path.dirname(wasmPackagePath), 'out', JAVA_WASM));
    parser.setLanguage(language);
    return parser;
  } catch (err) {
    parser.delete();
    throw err;
  }
}

/**
 * Shared Java parser. The runtime and grammar load once per process; a failed
 * load is retried on the next call.
 */
export function loadJavaParser(): Promise<Parser> {
  if (!loading) {
    loading = createJavaParser().catch((err: unknown) => {
      loading = null;
      throw err;
    });
  }
  return loading;
}
