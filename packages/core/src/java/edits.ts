// packages/core/src/java/edits.ts — Text edits that keep the surrounding layout tidy

function isIndent(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

/** Start offset of the line ending just before `offset` when that line is blank, else -1. */
function blankLineBefore(source: string, offset: number): number {
  if (offset === 0) return -1;
  let i = offset - 1;
  if (source[i - 1] === '\r') i--;
  while (i > 0 && isIndent(source[i - 1])) i--;
  return i === 0 || source[i - 1] === '\n' ? i : -1;
}

/** End offset (past the newline) of the line starting at `offset` when it is blank, else -1. */
function blankLineAt(source: string, offset: number): number {
  let i = offset;
  while (isIndent(source[i])) i++;
  if (source[i] === '\n') return i + 1;
  if (source[i] === '\r' && source[i + 1] === '\n') return i + 2;
  return -1;
}

function closesBlock(source: string, offset: number): boolean {
  let i = offset;
  while (isIndent(source[i])) i++;
  return source[i] === '}';
}

/**
 * Delete `[start, end)`. When the range occupies whole lines, the lines go with
 * it, along with one of two blank lines it would leave adjacent, or a blank
 * line it would leave before a closing brace.
 */
export function removeDeclaration(source: string, start: number, end: number): string {
  let from = start;
  let to = end;

  let lineBegin = from;
  while (lineBegin > 0 && isIndent(source[lineBegin - 1])) lineBegin--;
  const startsLine = lineBegin === 0 || source[lineBegin - 1] === '\n';

  let lineEnd = to;
  while (lineEnd < source.length && isIndent(source[lineEnd])) lineEnd++;
  let endsLine = false;
  if (lineEnd === source.length) {
    endsLine = true;
  } else if (source[lineEnd] === '\n') {
    lineEnd++;
    endsLine = true;
  } else if (source[lineEnd] === '\r' && source[lineEnd + 1] === '\n') {
    lineEnd += 2;
    endsLine = true;
  }

  if (startsLine && endsLine) {
    from = lineBegin;
    to = lineEnd;
    const previousBlank = blankLineBefore(source, from);
    if (previousBlank >= 0) {
      const nextBlankEnd = blankLineAt(source, to);
      if (nextBlankEnd >= 0) to = nextBlankEnd;
      else if (closesBlock(source, to)) from = previousBlank;
    }
  }

  return source.slice(0, from) + source.slice(to);
}

/** Splice `[start, end)` out without touching anything around it. */
export function spliceOut(source: string, start: number, end: number): string {
  return source.slice(0, start) + source.slice(end);
}
