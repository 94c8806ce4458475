// packages/core/src/cleanup/marking.ts — Scope marker comment at the top of a source file

import type { SourceStore } from '../java/source-store.js';
import type { MarkedFile } from '../types/cleanup.js';
import { SCOPE_MARKER } from '../utils/constants.js';

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\uFEFF';
}

/** The first thing in a file when it is a `//` comment. */
export function leadingLineComment(source: string): { start: number; end: number; text: string } | null {
  let pos = 0;
  while (pos < source.length && isBlank(source[pos])) pos++;
  if (!source.startsWith('//', pos)) return null;
  let end = source.indexOf('\n', pos);
  if (end < 0) end = source.length;
  if (source[end - 1] === '\r') end--;
  return { start: pos, end, text: source.slice(pos, end) };
}

export class FileMarkingCoordinator {
  constructor(
    private readonly store: SourceStore,
    readonly marker: string = SCOPE_MARKER,
  ) {}

  private markerIn(source: string): { start: number; end: number } | null {
    const comment = leadingLineComment(source);
    return comment && comment.text.trim() === this.marker ? comment : null;
  }

  exists(file: string): boolean {
    return this.store.exists(file);
  }

  isMarked(file: string): boolean {
    return this.markerIn(this.store.read(file)) !== null;
  }

  status(files: readonly string[] = this.store.list()): MarkedFile[] {
    return files.map((file) => ({ file, marked: this.isMarked(file) }));
  }

  listMarkedFiles(files: readonly string[] = this.store.list()): string[] {
    return files.filter((file) => this.isMarked(file));
  }

  /** Returns the files that were not marked before. */
  mark(files: readonly string[]): string[] {
    const changed: string[] = [];
    for (const file of files) {
      const source = this.store.read(file);
      if (this.markerIn(source)) continue;
      this.store.write(file, `${this.marker}\n${source}`);
      changed.push(file);
    }
    return changed;
  }

  /** Returns the files that carried the marker. */
  unmark(files: readonly string[]): string[] {
    const changed: string[] = [];
    for (const file of files) {
      const source = this.store.read(file);
      const marker = this.markerIn(source);
      if (!marker) continue;
      let end = marker.end;
      if (source[end] === '\r') end++;
      if (source[end] === '\n') end++;
      this.store.write(file, source.slice(0, marker.start) + source.slice(end));
      changed.push(file);
    }
    return changed;
  }
}
