import type { Stage } from './types/index.js';

export interface CompendiumErrorOptions {
  path?: string | undefined;
  hint?: string | undefined;
  code?: number | undefined;
  cause?: unknown;
}

/**
 * Raised when one stage of a run (config, scan, extract, encode, write)
 * cannot complete. `stage` and `path` say where, `hint` says what to try next.
 */
export class CompendiumError extends Error {
  public readonly stage: Stage;
  public readonly path?: string | undefined;
  public readonly hint?: string | undefined;
  /** Process exit code used by the CLI */
  public readonly code: number;

  constructor(stage: Stage, message: string, options: CompendiumErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CompendiumError';
    this.stage = stage;
    this.path = options.path;
    this.hint = options.hint;
    this.code = options.code ?? 1;
  }
}

/**
 * Bad input detected before any output is produced: a missing root,
 * an empty selection, a malformed pattern or size.
 */
export class ConfigurationError extends CompendiumError {
  constructor(message: string, options: Omit<CompendiumErrorOptions, 'code'> = {}) {
    super('config', message, { ...options, code: 2 });
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
