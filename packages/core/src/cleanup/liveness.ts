// packages/core/src/cleanup/liveness.ts — Reference counting and transitive dead-method closure

import { CLEANUP_CATEGORIES, emptyCounts, type CleanupAnalysis, type CleanupMode, type FileFindings } from '../types/cleanup.js';
import type { CleanupPolicy } from '../types/config.js';
import type { ModelSnapshot } from '../types/model.js';
import type { ClassSymbol, CodeSymbol, FieldSymbol, ImportSymbol, MethodSymbol } from '../types/symbols.js';
import {
  classify,
  createClassificationContext,
  isJavaLangImport,
  isTransitivelyRemovable,
  type ClassificationContext,
} from './classifier.js';

/** Read-only questions about one snapshot. Holds no state across snapshots. */
export class LivenessAnalyzer {
  readonly context: ClassificationContext;

  constructor(
    private readonly snapshot: ModelSnapshot,
    private readonly policy: CleanupPolicy,
  ) {
    this.context = createClassificationContext(snapshot, policy);
  }

  /** References from outside the symbol's own body. */
  externalReferenceCount(symbol: CodeSymbol): number {
    return this.snapshot.findReferences(symbol).filter((ref) => ref.referencingMethod !== symbol.identity).length;
  }

  findUnusedImports(files: readonly string[]): ImportSymbol[] {
    return files.flatMap((file) =>
      this.snapshot
        .getSymbols(file)
        .imports.filter(
          (symbol) =>
            classify(symbol, this.context) === 'import' &&
            (isJavaLangImport(symbol) || this.externalReferenceCount(symbol) === 0),
        ),
    );
  }

  findUnusedFields(files: readonly string[]): FieldSymbol[] {
    return files.flatMap((file) =>
      this.snapshot
        .getSymbols(file)
        .fields.filter((symbol) => classify(symbol, this.context) === 'field' && this.externalReferenceCount(symbol) === 0),
    );
  }

  findEmptyClasses(files: readonly string[]): ClassSymbol[] {
    return files.flatMap((file) =>
      this.snapshot
        .getSymbols(file)
        .classes.filter((symbol) => classify(symbol, this.context) === 'class' && this.externalReferenceCount(symbol) === 0),
    );
  }

  findUnusedDeprecatedMethods(files: readonly string[]): MethodSymbol[] {
    return files.flatMap((file) =>
      this.snapshot
        .getSymbols(file)
        .methods.filter(
          (symbol) => classify(symbol, this.context) === 'deprecated-method' && this.externalReferenceCount(symbol) === 0,
        ),
    );
  }

  /** Methods that lose their last caller once `seeds` are gone. */
  findTransitivelyUnusedMethods(seeds: readonly MethodSymbol[]): MethodSymbol[] {
    return this.traceTransitivelyUnusedMethods(seeds).methods;
  }

  /**
   * Each resolved call site in a dead body takes one reference off its target;
   * a target at zero is dead too and its own callees are visited in turn.
   * `deadCallers` maps every dead target to the dead methods that called it,
   * in the order they died.
   */
  traceTransitivelyUnusedMethods(seeds: readonly MethodSymbol[]): {
    methods: MethodSymbol[];
    deadCallers: Record<string, string[]>;
  } {
    const dead = new Set(seeds.map((seed) => seed.identity));
    const remaining = new Map<string, number>();
    const callers = new Map<string, Set<string>>();
    const methods: MethodSymbol[] = [];
    const deadCallers: Record<string, string[]> = {};
    const queue: { target: MethodSymbol; caller: string }[] = [];

    const enqueueCallees = (method: MethodSymbol): void => {
      for (const call of this.snapshot.callExpressionsIn(method)) {
        const target = this.snapshot.resolveCallTarget(call);
        if (target) queue.push({ target, caller: method.identity });
      }
    };

    seeds.forEach(enqueueCallees);
    for (let head = 0; head < queue.length; head++) {
      const { target, caller } = queue[head];
      if (dead.has(target.identity)) continue;

      let seen = callers.get(target.identity);
      if (!seen) {
        seen = new Set();
        callers.set(target.identity, seen);
      }
      seen.add(caller);

      const count = (remaining.get(target.identity) ?? this.externalReferenceCount(target)) - 1;
      remaining.set(target.identity, count);
      if (count > 0 || !isTransitivelyRemovable(target, this.policy.annotations)) continue;

      dead.add(target.identity);
      methods.push(target);
      deadCallers[target.identity] = [...seen];
      enqueueCallees(target);
    }
    return { methods, deadCallers };
  }

  /**
   * One read-only pass. Deprecated-controller runs look for deprecated seeds in
   * `files` and follow them anywhere in the project; marked-file runs look for
   * imports, fields and classes in `files` only.
   */
  analyze(mode: CleanupMode, files: readonly string[]): CleanupAnalysis {
    const findings = new Map<string, FileFindings>();
    const bucket = (file: string): FileFindings => {
      let entry = findings.get(file);
      if (!entry) {
        entry = { file, imports: [], fields: [], classes: [], deprecatedMethods: [], transitiveMethods: [] };
        findings.set(file, entry);
      }
      return entry;
    };

    let deadCallers: Record<string, string[]> = {};
    if (mode === 'deprecated-controllers') {
      const seeds = this.findUnusedDeprecatedMethods(files);
      for (const method of seeds) bucket(method.file).deprecatedMethods.push(method);
      const traced = this.traceTransitivelyUnusedMethods(seeds);
      for (const method of traced.methods) bucket(method.file).transitiveMethods.push(method);
      deadCallers = traced.deadCallers;
    } else {
      for (const symbol of this.findUnusedImports(files)) bucket(symbol.file).imports.push(symbol);
      for (const symbol of this.findUnusedFields(files)) bucket(symbol.file).fields.push(symbol);
      for (const symbol of this.findEmptyClasses(files)) bucket(symbol.file).classes.push(symbol);
    }

    const ordered = [...findings.values()].sort((a, b) => a.file.localeCompare(b.file));
    const totals = emptyCounts();
    for (const entry of ordered) {
      totals['deprecated-method'] += entry.deprecatedMethods.length;
      totals['transitive-method'] += entry.transitiveMethods.length;
      totals.import += entry.imports.length;
      totals.field += entry.fields.length;
      totals.class += entry.classes.length;
    }
    const total = CLEANUP_CATEGORIES.reduce((sum, category) => sum + totals[category], 0);

    return { mode, files: [...files], findings: ordered, totals, total, deadCallers };
  }
}
