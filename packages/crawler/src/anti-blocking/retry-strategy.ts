import { AuthRejectedError, isAuthRejectionStatus } from '@workspace/browser-session';
import { isAxiosError } from 'axios';
import { UnexpectedStatusError, UnitTimeoutError, errorMessage } from '../errors.js';
import type { ErrorClass, RetryDecision, RetryStrategyConfig } from './types.js';

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxAttempts: 5,
  retryDelayMs: 1000,
  maxDelayMs: 8000,
};

const NETWORK_MARKERS = [
  'econnreset',
  'econnrefused',
  'econnaborted',
  'enotfound',
  'etimedout',
  'socket hang up',
  'net::err_',
  'navigation timeout',
  'network',
];

const PARSE_MARKERS = ['parse', 'unexpected token', 'unexpected response'];

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;

  constructor(config?: Partial<RetryStrategyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  classify(error: unknown): ErrorClass {
    if (error instanceof AuthRejectedError) {
      return 'auth';
    }

    if (error instanceof UnitTimeoutError) {
      return 'timeout';
    }

    if (error instanceof UnexpectedStatusError) {
      return 'network';
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined && isAuthRejectionStatus(status)) {
        return 'auth';
      }

      if (status === undefined || status === 429 || status >= 500) {
        return 'network';
      }
    }

    if (error instanceof SyntaxError) {
      return 'parse';
    }

    const message = errorMessage(error).toLowerCase();

    if (NETWORK_MARKERS.some((marker) => message.includes(marker))) {
      return 'network';
    }

    if (PARSE_MARKERS.some((marker) => message.includes(marker))) {
      return 'parse';
    }

    return 'system';
  }

  /**
   * @param attempt attempts made so far, counting the one that just failed
   */
  decide(errorClass: ErrorClass, attempt: number): RetryDecision {
    const canRetry = attempt < this.config.maxAttempts;

    switch (errorClass) {
      case 'auth':
        return {
          shouldRetry: canRetry,
          refreshSession: true,
          delayMs: this.config.retryDelayMs,
          errorClass,
        };

      case 'network':
        return {
          shouldRetry: canRetry,
          refreshSession: false,
          delayMs: Math.min(
            this.config.retryDelayMs * Math.pow(2, attempt - 1),
            this.config.maxDelayMs,
          ),
          errorClass,
        };

      case 'timeout':
      case 'parse':
      case 'system':
        return {
          shouldRetry: false,
          refreshSession: false,
          delayMs: 0,
          errorClass,
        };
    }
  }
}
