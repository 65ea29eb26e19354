/**
 * Login or shared-context acquisition failed; the run cannot start.
 */
export class SessionBootstrapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionBootstrapError';
  }
}

export class UnitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Unit attempt timeout after ${timeoutMs}ms`);
    this.name = 'UnitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A response status the caller has no handling for; retried like a
 * transient network error.
 */
export class UnexpectedStatusError extends Error {
  readonly status: number;

  constructor(status: number, message = `Unexpected HTTP ${status}`) {
    super(message);
    this.name = 'UnexpectedStatusError';
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
