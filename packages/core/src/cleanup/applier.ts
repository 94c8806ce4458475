// packages/core/src/cleanup/applier.ts — Deletes one symbol, turning errors into per-item results

import type { ApplyResult } from '../types/cleanup.js';
import type { CodeModelProvider } from '../types/model.js';
import type { CodeSymbol } from '../types/symbols.js';
import { errorMessage, StaleSymbolError } from '../utils/errors.js';

export class MutationApplier {
  constructor(private readonly provider: CodeModelProvider) {}

  /** Never throws: a stale symbol is skipped, anything else is a failure. */
  async apply(symbol: CodeSymbol): Promise<ApplyResult> {
    try {
      await this.provider.delete(symbol);
      return { status: 'removed' };
    } catch (err) {
      if (err instanceof StaleSymbolError) return { status: 'skipped', reason: err.message };
      return { status: 'failed', reason: errorMessage(err) };
    }
  }
}
