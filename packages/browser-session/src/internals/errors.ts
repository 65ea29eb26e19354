/**
 * The remote side rejected the current credentials (HTTP 401/403 or a login
 * wall). Callers refresh the session and retry.
 */
export class AuthRejectedError extends Error {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'AuthRejectedError';
    this.statusCode = statusCode;
  }
}

export class LoginError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoginError';
  }
}

export function isAuthRejectionStatus(statusCode: number | undefined): boolean {
  return statusCode === 401 || statusCode === 403;
}
