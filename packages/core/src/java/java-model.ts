// packages/core/src/java/java-model.ts — CodeModelProvider over a SourceStore of Java files

import type Parser from 'web-tree-sitter';
import type { CodeModelProvider, ModelSnapshot } from '../types/model.js';
import { describeSymbol, type CodeSymbol } from '../types/symbols.js';
import { errorMessage, ModelReadError, MutationError, StaleSymbolError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { locateDeclaration } from './declarations.js';
import { removeDeclaration, spliceOut } from './edits.js';
import { loadJavaParser } from './grammar.js';
import { parseJava, type ParsedUnit } from './parser.js';
import { JavaSnapshot, type SourceFile } from './snapshot.js';
import type { SourceStore } from './source-store.js';

export interface JavaCodeModelOptions {
  externalSupertypesAreOverrides?: boolean;
  logger?: Logger;
}

export class JavaCodeModel implements CodeModelProvider {
  private readonly logger: Logger;

  constructor(
    readonly store: SourceStore,
    private readonly options: JavaCodeModelOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  private async parser(): Promise<Parser> {
    try {
      return await loadJavaParser();
    } catch (err) {
      throw new ModelReadError(`Cannot load the Java grammar: ${errorMessage(err)}`);
    }
  }

  async readSnapshot(): Promise<ModelSnapshot> {
    const parser = await this.parser();
    let files: string[];
    try {
      files = this.store.list();
    } catch (err) {
      if (err instanceof ModelReadError) throw err;
      throw new ModelReadError(`Cannot list sources under ${this.store.root}: ${errorMessage(err)}`);
    }

    const sources: SourceFile[] = files.map((file) => ({ file, source: this.store.read(file) }));
    this.logger.debug(`Indexed ${sources.length} source file(s)`);
    return new JavaSnapshot(sources, {
      parser,
      externalSupertypesAreOverrides: this.options.externalSupertypesAreOverrides ?? true,
      logger: this.logger,
    });
  }

  async delete(symbol: CodeSymbol): Promise<void> {
    const label = describeSymbol(symbol);
    if (!this.store.exists(symbol.file)) {
      throw new StaleSymbolError(`${label}: ${symbol.file} no longer exists`, symbol.identity);
    }

    let source: string;
    try {
      source = this.store.read(symbol.file);
    } catch (err) {
      throw new MutationError(`Cannot read ${symbol.file}: ${errorMessage(err)}`, label);
    }

    const parser = await this.parser();
    let unit: ParsedUnit;
    try {
      unit = parseJava(parser, source);
    } catch (err) {
      throw new MutationError(`Cannot parse ${symbol.file}: ${errorMessage(err)}`, label);
    }

    const span = locateDeclaration(symbol.file, unit, symbol.identity);
    if (!span) {
      throw new StaleSymbolError(`${label} is no longer declared in ${symbol.file}`, symbol.identity);
    }

    const updated = span.wholeLines
      ? removeDeclaration(source, span.start, span.end)
      : spliceOut(source, span.start, span.end);
    this.store.write(symbol.file, updated);
    this.logger.debug(`Removed ${label} from ${symbol.file}`);
  }
}
