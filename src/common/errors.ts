/**
 * Raised while the environment is mapped onto the application config.
 * Bootstrap treats it as fatal.
 */
export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export type FetchErrorKind = 'EXHAUSTED' | 'CANCELLED';

/**
 * Definitive failure of a retried read. `EXHAUSTED` means every attempt
 * failed, `CANCELLED` means the caller's signal fired during a backoff wait.
 */
export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    readonly operation: string,
    readonly attempts: number,
    readonly lastError?: unknown,
  ) {
    super(
      kind === 'EXHAUSTED'
        ? `${operation} failed after ${attempts} attempts: ${describeError(lastError)}`
        : `${operation} cancelled after ${attempts} attempts`,
    );
    this.name = 'FetchError';
  }
}

export class UnknownVenueError extends Error {
  constructor(readonly venue: string) {
    super(`Unknown venue: ${venue}`);
    this.name = 'UnknownVenueError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
