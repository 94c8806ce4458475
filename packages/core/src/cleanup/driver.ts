// packages/core/src/cleanup/driver.ts — Confirm once, then remove in bounded passes until nothing is left

import { DEFAULT_POLICY } from '../config/defaults.js';
import { CancellationError, type CancellationToken } from '../engine/cancellation.js';
import { EventBus } from '../engine/event-bus.js';
import {
  emptyCounts,
  type CleanupAnalysis,
  type CleanupMode,
  type CleanupReport,
  type ConfirmFn,
  type PassSummary,
  type RunOutcome,
} from '../types/cleanup.js';
import type { CleanupPolicy } from '../types/config.js';
import type { CleanupEvent } from '../types/events.js';
import type { CodeModelProvider } from '../types/model.js';
import { describeSymbol } from '../types/symbols.js';
import { MAX_PASSES } from '../utils/constants.js';
import { CleanupInProgressError, ConfigError, ModelReadError, MutationError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { MutationApplier } from './applier.js';
import { LivenessAnalyzer } from './liveness.js';
import type { FileMarkingCoordinator } from './marking.js';
import { planRemovals } from './planner.js';
import { buildSummary } from './summary.js';

export type DriverState = 'idle' | 'analyzing' | 'awaiting-confirmation' | 'applying';

export interface CleanupDriverOptions {
  provider: CodeModelProvider;
  /** Needed for marked-file runs, and for marking files a deprecated-controller run touched. */
  marking?: FileMarkingCoordinator;
  policy?: CleanupPolicy;
  maxPasses?: number;
  markAffectedFiles?: boolean;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface RunOptions {
  confirm: ConfirmFn;
  /** Deprecated-controller runs only: files searched for deprecated methods. Defaults to every file. */
  scope?: readonly string[];
  cancellation?: CancellationToken;
}

// One run at a time per provider, across driver instances.
const activeProviders = new WeakSet<CodeModelProvider>();

export class CleanupDriver {
  readonly eventBus: EventBus;
  private readonly provider: CodeModelProvider;
  private readonly marking: FileMarkingCoordinator | undefined;
  private readonly policy: CleanupPolicy;
  private readonly maxPasses: number;
  private readonly markAffectedFiles: boolean;
  private readonly logger: Logger;
  private currentState: DriverState = 'idle';

  constructor(options: CleanupDriverOptions) {
    this.provider = options.provider;
    this.marking = options.marking;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.maxPasses = Math.min(Math.max(options.maxPasses ?? MAX_PASSES, 1), MAX_PASSES);
    this.markAffectedFiles = options.markAffectedFiles ?? true;
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = options.logger ?? silentLogger;
  }

  get state(): DriverState {
    return this.currentState;
  }

  async analyzeDeprecatedControllers(scope?: readonly string[]): Promise<CleanupAnalysis> {
    return this.analyze('deprecated-controllers', scope ?? null, null, 0);
  }

  async analyzeMarkedFiles(): Promise<CleanupAnalysis> {
    return this.analyze('marked-files', this.requireMarking().listMarkedFiles(), null, 0);
  }

  async runDeprecatedControllerCleanup(options: RunOptions): Promise<CleanupReport> {
    return this.run('deprecated-controllers', options);
  }

  async runMarkedFileCleanup(options: RunOptions): Promise<CleanupReport> {
    return this.run('marked-files', options);
  }

  private requireMarking(): FileMarkingCoordinator {
    if (!this.marking) throw new ConfigError('Marked-file cleanup needs a file marking coordinator', 'marking');
    return this.marking;
  }

  private emit(event: CleanupEvent): void {
    this.eventBus.emitEvent(event);
  }

  private async run(mode: CleanupMode, options: RunOptions): Promise<CleanupReport> {
    if (activeProviders.has(this.provider)) throw new CleanupInProgressError();
    activeProviders.add(this.provider);

    const runId = generateRunId();
    const startedAt = Date.now();
    const report: CleanupReport = {
      runId,
      mode,
      outcome: 'completed',
      removedCounts: emptyCounts(),
      totalRemoved: 0,
      removed: [],
      failures: [],
      passesRun: 0,
      passes: [],
      markedFiles: [],
      unmarkedFiles: [],
      durationMs: 0,
    };

    this.emit({ type: 'run.started', runId, mode, timestamp: '' });
    this.logger.info(`Cleanup ${runId} started (${mode})`);
    try {
      report.outcome = await this.execute(mode, options, report);
    } catch (err) {
      if (err instanceof CancellationError) {
        report.outcome = 'cancelled';
        report.error = err.message;
      } else if (err instanceof ModelReadError) {
        report.outcome = 'failed';
        report.error = err.message;
        this.logger.error(`Cleanup ${runId} failed: ${err.message}`);
      } else {
        throw err;
      }
    } finally {
      activeProviders.delete(this.provider);
      this.currentState = 'idle';
    }

    report.durationMs = Date.now() - startedAt;
    this.logger.info(
      `Cleanup ${runId} ${report.outcome}: ${report.totalRemoved} removed in ${report.passesRun} pass(es)`,
    );
    this.emit({ type: 'run.completed', runId, outcome: report.outcome, report, timestamp: '' });
    return report;
  }

  private async execute(mode: CleanupMode, options: RunOptions, report: CleanupReport): Promise<RunOutcome> {
    const { runId } = report;
    const marking = mode === 'marked-files' ? this.requireMarking() : null;
    const scope = marking ? marking.listMarkedFiles() : options.scope ? [...options.scope] : null;

    if (marking && scope?.length === 0) {
      this.logger.info('No marked files');
      return 'nothing-to-do';
    }

    this.currentState = 'analyzing';
    options.cancellation?.throwIfCancelled();
    const initial = await this.analyze(mode, scope, runId, 0);
    if (initial.total === 0) {
      if (marking && scope) this.releaseScope(marking, scope, report);
      return 'nothing-to-do';
    }

    this.currentState = 'awaiting-confirmation';
    this.emit({ type: 'confirmation.requested', runId, candidates: initial.total, timestamp: '' });
    const accepted = await options.confirm(buildSummary(initial));
    if (!accepted) {
      this.logger.info(`Cleanup ${runId} declined`);
      return 'declined';
    }

    this.currentState = 'applying';
    const applier = new MutationApplier(this.provider);
    const lostMethods = new Set<string>();

    for (let pass = 1; pass <= this.maxPasses; pass++) {
      // A started pass always finishes; cancellation only stops the next one.
      options.cancellation?.throwIfCancelled();
      report.passesRun = pass;
      this.emit({ type: 'pass.started', runId, pass, maxPasses: this.maxPasses, timestamp: '' });

      const analysis = await this.analyze(mode, scope, runId, pass);
      const batch = planRemovals(analysis, this.policy);
      const summary: PassSummary = { pass, planned: batch.total, removed: 0, skipped: 0, failed: 0, counts: emptyCounts() };
      const removedThisPass = new Set<string>();

      for (const { symbol, category, requires } of batch.items) {
        const label = describeSymbol(symbol);
        // a callee stays while any dead caller that still calls it is in the source
        const survivor = requires.find((identity) => !removedThisPass.has(identity));
        if (survivor !== undefined) {
          summary.skipped++;
          this.logger.debug(`Deferred ${label}: caller ${survivor} was not removed`);
          continue;
        }

        const result = await applier.apply(symbol);
        switch (result.status) {
          case 'removed':
            removedThisPass.add(symbol.identity);
            summary.removed++;
            summary.counts[category]++;
            report.removedCounts[category]++;
            report.totalRemoved++;
            report.removed.push({ pass, category, identity: symbol.identity, symbol: label, file: symbol.file });
            if (symbol.kind === 'method') lostMethods.add(symbol.file);
            this.emit({ type: 'item.removed', runId, pass, category, symbol: label, file: symbol.file, timestamp: '' });
            break;
          case 'skipped':
            summary.skipped++;
            this.logger.debug(`Skipped ${label}: ${result.reason}`);
            break;
          case 'failed':
            summary.failed++;
            report.failures.push({ symbol: label, identity: symbol.identity, category, file: symbol.file, reason: result.reason });
            this.logger.warn(`Could not remove ${label}: ${result.reason}`);
            this.emit({
              type: 'item.failed',
              runId,
              pass,
              category,
              symbol: label,
              file: symbol.file,
              reason: result.reason,
              timestamp: '',
            });
            break;
        }
      }

      report.passes.push(summary);
      this.emit({ type: 'pass.completed', runId, pass, removed: summary.removed, failed: summary.failed, timestamp: '' });
      if (summary.removed === 0) break;
    }

    if (mode === 'deprecated-controllers' && this.markAffectedFiles && this.marking && lostMethods.size > 0) {
      const coordinator = this.marking;
      const files = [...lostMethods].sort();
      const marked = this.writeMarkers(report, 'mark', () => coordinator.mark(files));
      if (marked) {
        report.markedFiles = marked;
        if (marked.length > 0) this.emit({ type: 'files.marked', runId, files: marked, timestamp: '' });
      }
    }
    if (marking && scope) this.releaseScope(marking, scope, report);
    return 'completed';
  }

  private releaseScope(marking: FileMarkingCoordinator, scope: readonly string[], report: CleanupReport): void {
    // files deleted outside the run are left alone
    const unmarked = this.writeMarkers(report, 'unmark', () => marking.unmark(scope.filter((file) => marking.exists(file))));
    if (!unmarked) return;
    report.unmarkedFiles = unmarked;
    if (unmarked.length > 0) {
      this.emit({ type: 'files.unmarked', runId: report.runId, files: unmarked, timestamp: '' });
    }
  }

  /** Removals already happened by now, so a marker write failure goes on the report instead of unwinding it. */
  private writeMarkers(report: CleanupReport, action: 'mark' | 'unmark', write: () => string[]): string[] | null {
    try {
      return write();
    } catch (err) {
      if (!(err instanceof MutationError || err instanceof ModelReadError)) throw err;
      report.error = `Could not ${action} files: ${err.message}`;
      this.logger.error(`Cleanup ${report.runId}: ${report.error}`);
      return null;
    }
  }

  private async analyze(
    mode: CleanupMode,
    scope: readonly string[] | null,
    runId: string | null,
    pass: number,
  ): Promise<CleanupAnalysis> {
    const snapshot = await this.provider.readSnapshot();
    const present = new Set(snapshot.listFiles());
    const files = scope ? scope.filter((file) => present.has(file)) : [...present];
    const analysis = new LivenessAnalyzer(snapshot, this.policy).analyze(mode, files);

    if (runId) {
      this.emit({
        type: 'analysis.completed',
        runId,
        pass,
        files: files.length,
        candidates: analysis.total,
        timestamp: '',
      });
    }
    this.logger.debug(`Analysis (${mode}, pass ${pass}): ${analysis.total} candidate(s) in ${files.length} file(s)`);
    return analysis;
  }
}
