export type ErrorKind = 'store' | 'repository' | 'pending-change-exists' | 'config';

/**
 * Base class for errors that cross module boundaries.
 * `kind` lets callers switch without instanceof chains.
 */
export class CodegateError extends Error {
  constructor(public readonly kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodegateError';
  }
}

/** The durable store could not be read or written. Fatal to the caller. */
export class StoreError extends CodegateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store', message, options);
    this.name = 'StoreError';
  }
}

export class RepositoryError extends CodegateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('repository', message, options);
    this.name = 'RepositoryError';
  }
}

export class PendingChangeExistsError extends CodegateError {
  constructor(public readonly changeId: string) {
    super('pending-change-exists', `Change ${changeId} is still awaiting approval`);
    this.name = 'PendingChangeExistsError';
  }
}

export class ConfigError extends CodegateError {
  constructor(public readonly problems: string[]) {
    super('config', `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Short reference id for matching a user-facing message to a log line. */
export function generateErrorRef(): string {
  return Date.now().toString(36).slice(-6);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
