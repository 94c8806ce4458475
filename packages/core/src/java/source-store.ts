// packages/core/src/java/source-store.ts — Where Java sources are read from and written back to

import { type Dirent, existsSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import type { Ignore } from 'ignore';
import { JAVA_EXTENSIONS } from '../utils/constants.js';
import { errorMessage, ModelReadError, MutationError } from '../utils/errors.js';

/** Project-relative, forward-slash paths throughout. */
export interface SourceStore {
  readonly root: string;
  list(): string[];
  read(file: string): string;
  write(file: string, content: string): void;
  exists(file: string): boolean;
}

function isJavaFile(path: string): boolean {
  return JAVA_EXTENSIONS.some((ext) => path.endsWith(ext));
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

export class FileSystemSourceStore implements SourceStore {
  private readonly sourceRoots: readonly string[];

  constructor(
    readonly root: string,
    private readonly options: { sourceRoots?: readonly string[]; ignore?: Ignore } = {},
  ) {
    this.sourceRoots = options.sourceRoots && options.sourceRoots.length > 0 ? options.sourceRoots : ['.'];
  }

  list(): string[] {
    const found = new Set<string>();
    for (const sourceRoot of this.sourceRoots) {
      const dir = join(this.root, sourceRoot);
      if (!existsSync(dir)) continue;
      if (!statSync(dir).isDirectory()) {
        throw new ModelReadError(`Source root is not a directory: ${sourceRoot}`);
      }
      this.walk(dir, found);
    }
    return [...found].sort();
  }

  private walk(dir: string, found: Set<string>): void {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      throw new ModelReadError(`Cannot list ${dir}: ${errorMessage(err)}`);
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      const rel = toPosix(relative(this.root, full));
      if (entry.isDirectory()) {
        if (this.options.ignore?.ignores(`${rel}/`)) continue;
        this.walk(full, found);
      } else if (entry.isFile() && isJavaFile(entry.name)) {
        if (this.options.ignore?.ignores(rel)) continue;
        found.add(rel);
      }
    }
  }

  read(file: string): string {
    try {
      return readFileSync(join(this.root, file), 'utf-8');
    } catch (err) {
      throw new ModelReadError(`Cannot read ${file}: ${errorMessage(err)}`, file);
    }
  }

  write(file: string, content: string): void {
    try {
      writeFileSync(join(this.root, file), content, 'utf-8');
    } catch (err) {
      throw new MutationError(`Cannot write ${file}: ${errorMessage(err)}`);
    }
  }

  exists(file: string): boolean {
    return existsSync(join(this.root, file));
  }
}

/** In-memory project, used by tests and by callers that hold sources themselves. */
export class MemorySourceStore implements SourceStore {
  readonly root = '<memory>';
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [file, content] of Object.entries(files)) this.files.set(file, content);
  }

  list(): string[] {
    return [...this.files.keys()].filter(isJavaFile).sort();
  }

  read(file: string): string {
    const content = this.files.get(file);
    if (content === undefined) throw new ModelReadError(`No such file: ${file}`, file);
    return content;
  }

  write(file: string, content: string): void {
    this.files.set(file, content);
  }

  exists(file: string): boolean {
    return this.files.has(file);
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.files);
  }
}
