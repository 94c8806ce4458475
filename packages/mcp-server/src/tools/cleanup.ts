// packages/mcp-server/src/tools/cleanup.ts — sweeper_cleanup tool handler

import { buildSummary, cleanupInputSchema } from '@sweeper/core';
import type { CleanupReport, Project, RunStore } from '@sweeper/core';

/**
 * Without `confirm: true` this only reports what would be removed; the client
 * is expected to show that to the user and call again.
 */
export async function handleCleanup(project: Project, runStore: RunStore, args: unknown) {
  const input = cleanupInputSchema.parse(args);
  if (input.mode === 'marked-files' && input.files) {
    throw new Error('files only apply to mode deprecated-controllers; marked-file runs use the marked files');
  }

  if (!input.confirm) {
    const analysis =
      input.mode === 'marked-files'
        ? await project.driver.analyzeMarkedFiles()
        : await project.driver.analyzeDeprecatedControllers(input.files);
    const preview = {
      applied: false,
      message: 'Nothing was changed. Call again with confirm: true to remove these symbols.',
      total: analysis.total,
      files: analysis.findings.map((f) => f.file),
      summary: buildSummary(analysis).lines,
    };
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(preview, null, 2) }],
      isError: false,
    };
  }

  const confirm = () => true;
  const report: CleanupReport =
    input.mode === 'marked-files'
      ? await project.driver.runMarkedFileCleanup({ confirm })
      : await project.driver.runDeprecatedControllerCleanup({ confirm, scope: input.files });
  runStore.record(report, project.projectDir);

  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ applied: true, ...report }, null, 2) }],
    isError: report.outcome === 'failed',
  };
}
