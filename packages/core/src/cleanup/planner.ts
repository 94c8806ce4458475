// packages/core/src/cleanup/planner.ts — Turns an analysis into an ordered, deduplicated removal batch

import {
  CLEANUP_CATEGORIES,
  emptyCounts,
  type CleanupAnalysis,
  type CleanupCategory,
  type FileFindings,
  type PlannedRemoval,
  type RemovalBatch,
} from '../types/cleanup.js';
import type { CleanupPolicy } from '../types/config.js';
import type { CodeSymbol } from '../types/symbols.js';
import { hasEffect } from './classifier.js';

function symbolsIn(findings: FileFindings, category: CleanupCategory): CodeSymbol[] {
  switch (category) {
    case 'deprecated-method':
      return findings.deprecatedMethods;
    case 'transitive-method':
      return findings.transitiveMethods;
    case 'import':
      return findings.imports;
    case 'field':
      return findings.fields;
    case 'class':
      return findings.classes;
  }
}

/** Exclusions that hold no matter what an earlier stage decided. */
export function isExcluded(symbol: CodeSymbol, policy: CleanupPolicy): boolean {
  if (hasEffect(symbol, 'preserve', policy.annotations)) return true;
  switch (symbol.kind) {
    case 'method':
      return symbol.declaredInInterface || symbol.overrides || symbol.isConstructor;
    case 'field':
      return symbol.annotations.length > 0 || symbol.modifiers.includes('public') || symbol.modifiers.includes('static');
    case 'import':
      return symbol.isWildcard;
    case 'class':
      return false;
  }
}

/** Reorder `items` so each one follows whatever it requires from the same list. */
function afterRequirements(items: PlannedRemoval[]): PlannedRemoval[] {
  const pending = new Set(items.map((item) => item.symbol.identity));
  const ordered: PlannedRemoval[] = [];
  let rest = items;
  while (rest.length > 0) {
    const ready = rest.filter((item) => item.requires.every((identity) => !pending.has(identity)));
    // a cycle cannot come out of the dead-method trace; keep the remainder as is if one does
    const next = ready.length > 0 ? ready : rest;
    for (const item of next) {
      pending.delete(item.symbol.identity);
      ordered.push(item);
    }
    rest = rest.filter((item) => !next.includes(item));
  }
  return ordered;
}

export function planRemovals(analysis: CleanupAnalysis, policy: CleanupPolicy): RemovalBatch {
  const seen = new Set<string>();
  const items: PlannedRemoval[] = [];
  const counts = emptyCounts();

  for (const category of CLEANUP_CATEGORIES) {
    const planned: PlannedRemoval[] = [];
    for (const findings of analysis.findings) {
      for (const symbol of symbolsIn(findings, category)) {
        if (seen.has(symbol.identity) || isExcluded(symbol, policy)) continue;
        seen.add(symbol.identity);
        const requires = category === 'transitive-method' ? (analysis.deadCallers[symbol.identity] ?? []) : [];
        planned.push({ symbol, category, requires });
        counts[category]++;
      }
    }
    items.push(...(category === 'transitive-method' ? afterRequirements(planned) : planned));
  }

  return { items, counts, total: items.length };
}
