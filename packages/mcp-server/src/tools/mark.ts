// packages/mcp-server/src/tools/mark.ts — sweeper_mark tool handler

import { markInputSchema } from '@sweeper/core';
import type { Project } from '@sweeper/core';

function requireSources(project: Project, files: readonly string[]): void {
  if (files.length === 0) {
    throw new Error('files is required for mark and unmark');
  }
  const known = new Set(project.store.list());
  const unknown = files.filter((file) => !known.has(file));
  if (unknown.length > 0) {
    throw new Error(`Not Java sources of this project: ${unknown.join(', ')}`);
  }
}

export async function handleMark(project: Project, args: unknown) {
  const input = markInputSchema.parse(args);
  let result: unknown;

  switch (input.action) {
    case 'mark': {
      requireSources(project, input.files);
      result = { marked: project.marking.mark(input.files) };
      break;
    }
    case 'unmark': {
      requireSources(project, input.files);
      result = { unmarked: project.marking.unmark(input.files) };
      break;
    }
    case 'list': {
      const files = project.marking.listMarkedFiles();
      result = { files, count: files.length };
      break;
    }
  }

  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}
