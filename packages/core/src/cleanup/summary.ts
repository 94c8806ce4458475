// packages/core/src/cleanup/summary.ts — Confirmation summary shown before the first mutation

import type { CleanupAnalysis, CleanupCategory, CleanupSummary } from '../types/cleanup.js';
import { describeSymbol, type CodeSymbol } from '../types/symbols.js';
import { SUMMARY_PREVIEW_LIMIT } from '../utils/constants.js';

export const CATEGORY_LABELS: Record<CleanupCategory, string> = {
  'deprecated-method': 'Unused deprecated controller methods',
  'transitive-method': 'Methods that become unused',
  import: 'Unused imports',
  field: 'Unused fields',
  class: 'Empty or unused classes',
};

function section(label: string, symbols: readonly CodeSymbol[]): string[] {
  if (symbols.length === 0) return [];
  const lines = [`${label}: ${symbols.length}`];
  for (const symbol of symbols.slice(0, SUMMARY_PREVIEW_LIMIT)) {
    lines.push(`  - ${describeSymbol(symbol)} (${symbol.file})`);
  }
  if (symbols.length > SUMMARY_PREVIEW_LIMIT) {
    lines.push(`  ... and ${symbols.length - SUMMARY_PREVIEW_LIMIT} more`);
  }
  return lines;
}

export function buildSummary(analysis: CleanupAnalysis): CleanupSummary {
  const { findings } = analysis;
  const lines = [
    ...section(CATEGORY_LABELS['deprecated-method'], findings.flatMap((f) => f.deprecatedMethods)),
    ...section(CATEGORY_LABELS['transitive-method'], findings.flatMap((f) => f.transitiveMethods)),
    ...section(CATEGORY_LABELS.import, findings.flatMap((f) => f.imports)),
    ...section(CATEGORY_LABELS.field, findings.flatMap((f) => f.fields)),
    ...section(CATEGORY_LABELS.class, findings.flatMap((f) => f.classes)),
  ];
  return {
    mode: analysis.mode,
    totals: analysis.totals,
    total: analysis.total,
    files: findings.map((f) => f.file),
    lines,
  };
}

export function formatSummary(summary: CleanupSummary): string {
  const fileCount = summary.files.length;
  const header = `${summary.total} symbol(s) to remove in ${fileCount} file(s):`;
  return [header, ...summary.lines].join('\n');
}
