// tests/unit/cleanup/summary.test.ts
import { describe, expect, it } from 'vitest';
import { buildSummary, formatSummary } from '../../../src/cleanup/summary.js';
import { emptyCounts, type CleanupAnalysis } from '../../../src/types/cleanup.js';
import { fieldSymbol, importSymbol } from './fixtures.js';

function markedAnalysis(importCount: number): CleanupAnalysis {
  const imports = Array.from({ length: importCount }, (_, i) => importSymbol(`com.example.Type${i}`, { file: 'A.java' }));
  const fields = [fieldSymbol('x', { file: 'B.java' })];
  return {
    mode: 'marked-files',
    files: ['A.java', 'B.java'],
    findings: [
      { file: 'A.java', imports, fields: [], classes: [], deprecatedMethods: [], transitiveMethods: [] },
      { file: 'B.java', imports: [], fields, classes: [], deprecatedMethods: [], transitiveMethods: [] },
    ],
    totals: { ...emptyCounts(), import: importCount, field: 1 },
    total: importCount + 1,
    deadCallers: {},
  };
}

describe('buildSummary', () => {
  it('lists each non-empty category with its symbols', () => {
    const summary = buildSummary(markedAnalysis(2));
    expect(summary.files).toEqual(['A.java', 'B.java']);
    expect(summary.lines).toEqual([
      'Unused imports: 2',
      '  - import com.example.Type0 (A.java)',
      '  - import com.example.Type1 (A.java)',
      'Unused fields: 1',
      '  - Holder.x (B.java)',
    ]);
  });

  it('truncates long sections', () => {
    const { lines } = buildSummary(markedAnalysis(12));
    expect(lines[0]).toBe('Unused imports: 12');
    expect(lines[10]).toBe('  - import com.example.Type9 (A.java)');
    expect(lines[11]).toBe('  ... and 2 more');
    expect(lines[12]).toBe('Unused fields: 1');
  });
});

describe('formatSummary', () => {
  it('puts a header above the sections', () => {
    const text = formatSummary(buildSummary(markedAnalysis(1)));
    expect(text).toBe(
      ['2 symbol(s) to remove in 2 file(s):', 'Unused imports: 1', '  - import com.example.Type0 (A.java)', 'Unused fields: 1', '  - Holder.x (B.java)'].join('\n'),
    );
  });
});
