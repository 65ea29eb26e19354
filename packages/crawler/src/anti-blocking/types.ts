type ErrorClass = 'auth' | 'network' | 'timeout' | 'parse' | 'system';

type RetryDecision = {
  shouldRetry: boolean;
  /** Refresh shared credentials before the next attempt. */
  refreshSession: boolean;
  delayMs: number;
  errorClass: ErrorClass;
};

type RetryStrategyConfig = {
  maxAttempts: number;
  retryDelayMs: number;
  maxDelayMs: number;
};

export type { ErrorClass, RetryDecision, RetryStrategyConfig };
