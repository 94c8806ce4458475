// tests/unit/cleanup/planner.test.ts
import { describe, expect, it } from 'vitest';
import { isExcluded, planRemovals } from '../../../src/cleanup/planner.js';
import { DEFAULT_POLICY } from '../../../src/config/defaults.js';
import { emptyCounts, type CleanupAnalysis, type FileFindings } from '../../../src/types/cleanup.js';
import { classSymbol, fieldSymbol, importSymbol, methodSymbol } from './fixtures.js';

function findings(file: string, partial: Partial<FileFindings>): FileFindings {
  return { file, imports: [], fields: [], classes: [], deprecatedMethods: [], transitiveMethods: [], ...partial };
}

function analysis(entries: FileFindings[]): CleanupAnalysis {
  return { mode: 'deprecated-controllers', files: entries.map((e) => e.file), findings: entries, totals: emptyCounts(), total: 0, deadCallers: {} };
}

describe('planRemovals', () => {
  const oldA = methodSymbol('oldA', { file: 'A.java' });
  const helperA = methodSymbol('helperA', { file: 'A.java', modifiers: ['private'] });
  const oldB = methodSymbol('oldB', { file: 'B.java' });
  const overriding = methodSymbol('run', { file: 'B.java', overrides: true });
  const unusedImport = importSymbol('java.io.File', { file: 'A.java' });
  const publicField = fieldSymbol('exposed', { file: 'A.java', modifiers: ['public'] });
  const field = fieldSymbol('x', { file: 'A.java' });
  const empty = classSymbol('Empty', { file: 'A.java' });

  const batch = planRemovals(
    analysis([
      findings('A.java', {
        deprecatedMethods: [oldA],
        transitiveMethods: [oldA, helperA],
        imports: [unusedImport],
        fields: [publicField, field],
        classes: [empty],
      }),
      findings('B.java', { deprecatedMethods: [oldB], transitiveMethods: [overriding] }),
    ]),
    DEFAULT_POLICY,
  );

  it('orders by category first, then by file', () => {
    expect(batch.items.map((item) => [item.category, item.symbol.name])).toEqual([
      ['deprecated-method', 'oldA'],
      ['deprecated-method', 'oldB'],
      ['transitive-method', 'helperA'],
      ['import', 'File'],
      ['field', 'x'],
      ['class', 'Empty'],
    ]);
  });

  it('counts planned removals per category', () => {
    expect(batch.counts).toEqual({ 'deprecated-method': 2, 'transitive-method': 1, import: 1, field: 1, class: 1 });
    expect(batch.total).toBe(6);
  });

  it('orders transitive methods after the dead callers they depend on', () => {
    const seed = methodSymbol('old', { file: 'C.java' });
    const outer = methodSymbol('outer', { file: 'B.java', modifiers: ['private'] });
    const inner = methodSymbol('inner', { file: 'A.java', modifiers: ['private'] });
    const traced = planRemovals(
      {
        ...analysis([
          findings('A.java', { transitiveMethods: [inner] }),
          findings('B.java', { transitiveMethods: [outer] }),
          findings('C.java', { deprecatedMethods: [seed] }),
        ]),
        deadCallers: { [outer.identity]: [seed.identity], [inner.identity]: [outer.identity] },
      },
      DEFAULT_POLICY,
    );
    expect(traced.items.map((item) => [item.symbol.name, item.requires])).toEqual([
      ['old', []],
      ['outer', [seed.identity]],
      ['inner', [outer.identity]],
    ]);
  });

  it('plans nothing for an empty analysis', () => {
    expect(planRemovals(analysis([]), DEFAULT_POLICY)).toEqual({ items: [], counts: emptyCounts(), total: 0 });
  });
});

describe('isExcluded', () => {
  it('re-checks structural exclusions', () => {
    expect(isExcluded(methodSymbol('ctor', { isConstructor: true }), DEFAULT_POLICY)).toBe(true);
    expect(isExcluded(fieldSymbol('s', { modifiers: ['static'] }), DEFAULT_POLICY)).toBe(true);
    expect(isExcluded(importSymbol('java.util', { isWildcard: true }), DEFAULT_POLICY)).toBe(true);
    expect(isExcluded(classSymbol('Empty'), DEFAULT_POLICY)).toBe(false);
  });

  it('excludes anything carrying a preserve annotation', () => {
    const policy = { ...DEFAULT_POLICY, annotations: { Keep: 'preserve' as const } };
    expect(isExcluded(classSymbol('Empty', { annotations: ['Keep'] }), policy)).toBe(true);
  });
});
