// packages/mcp-server/src/tools/analyze.ts — sweeper_analyze tool handler

import { analyzeInputSchema, buildSummary } from '@sweeper/core';
import type { CleanupAnalysis, Project } from '@sweeper/core';

export async function handleAnalyze(project: Project, args: unknown) {
  const input = analyzeInputSchema.parse(args);

  let analysis: CleanupAnalysis;
  if (input.mode === 'marked-files') {
    if (input.files) {
      throw new Error('files only apply to mode deprecated-controllers; marked-file runs use the marked files');
    }
    analysis = await project.driver.analyzeMarkedFiles();
  } else {
    analysis = await project.driver.analyzeDeprecatedControllers(input.files);
  }

  const result = { ...analysis, summary: buildSummary(analysis).lines };
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}
