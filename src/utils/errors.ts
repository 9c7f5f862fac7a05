/**
 * Error types
 */

/**
 * An input source could not be opened or read.
 * Not recovered: the run stops at the first failing source.
 */
export class InputSourceError extends Error {
  public readonly source: string;
  public readonly code?: string;

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read ${source}: ${reason}`, { cause });
    this.name = 'InputSourceError';
    this.source = source;
    this.code = systemErrorCode(cause);
  }
}

/**
 * Type guard for input source errors
 */
export function isInputSourceError(error: unknown): error is InputSourceError {
  return error instanceof InputSourceError;
}

function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
