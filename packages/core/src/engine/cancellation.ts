// packages/core/src/engine/cancellation.ts — Cooperative cancellation between cleanup passes

export class CancellationToken {
  private cancelled = false;

  /** Signal cancellation. Idempotent. */
  cancel(): void {
    this.cancelled = true;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Throw if already cancelled. Checked at pass boundaries. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError('Operation was cancelled');
    }
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
