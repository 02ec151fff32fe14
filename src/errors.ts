/**
 * Error types surfaced by the engine. Everything else is logged and skipped.
 */

export type PersistenceErrorCode = 'read_failed' | 'write_failed';

export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  readonly path: string;

  constructor(code: PersistenceErrorCode, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${code === 'read_failed' ? 'Cannot read' : 'Cannot write'} ${path}: ${reason}`, { cause });
    this.name = 'PersistenceError';
    this.code = code;
    this.path = path;
  }
}

/** Thrown by the WorldStreamer constructor for an invalid configuration. */
export class ConfigError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid streaming config: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = [...errors];
  }
}
