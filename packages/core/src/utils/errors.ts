// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The code model could not be read or indexed. Fatal to the current run. */
export class ModelReadError extends Error {
  constructor(
    message: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = 'ModelReadError';
  }
}

/** A symbol identity no longer resolves against the current source. */
export class StaleSymbolError extends Error {
  constructor(
    message: string,
    public readonly identity: string,
  ) {
    super(message);
    this.name = 'StaleSymbolError';
  }
}

export class MutationError extends Error {
  constructor(
    message: string,
    public readonly symbol?: string,
  ) {
    super(message);
    this.name = 'MutationError';
  }
}

export class CleanupInProgressError extends Error {
  constructor(message = 'A cleanup run is already in progress for this project') {
    super(message);
    this.name = 'CleanupInProgressError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
