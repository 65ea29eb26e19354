import type { Logger } from '@workspace/logger';

type CountedOutcome = 'success' | 'empty' | 'fail' | 'skipped';

type RunMetricSnapshot = {
  outcomes: Record<CountedOutcome, number>;
  attempts: number;
  retries: number;
  refreshes: number;
  peakInFlight: number;
  durations: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

function emptyOutcomes(): Record<CountedOutcome, number> {
  return { success: 0, empty: 0, fail: 0, skipped: 0 };
}

export class RunMetrics {
  private outcomes: Record<CountedOutcome, number>;
  private attempts: number;
  private retries: number;
  private refreshes: number;
  private inFlight: number;
  private peakInFlight: number;
  private readonly durationValues: number[];

  constructor() {
    this.outcomes = emptyOutcomes();
    this.attempts = 0;
    this.retries = 0;
    this.refreshes = 0;
    this.inFlight = 0;
    this.peakInFlight = 0;
    this.durationValues = [];
  }

  recordOutcome(outcome: CountedOutcome, amount = 1): void {
    this.outcomes[outcome] += amount;
  }

  recordAttempt(): void {
    this.attempts += 1;
  }

  recordRetry(): void {
    this.retries += 1;
  }

  recordRefresh(): void {
    this.refreshes += 1;
  }

  unitStarted(): void {
    this.inFlight += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
  }

  unitFinished(durationMs: number): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.durationValues.push(durationMs);
  }

  snapshot(): RunMetricSnapshot {
    const count = this.durationValues.length;
    const total = this.durationValues.reduce((sum, value) => sum + value, 0);
    const min = count > 0 ? Math.min(...this.durationValues) : 0;
    const max = count > 0 ? Math.max(...this.durationValues) : 0;
    const avg = count > 0 ? total / count : 0;

    return {
      outcomes: { ...this.outcomes },
      attempts: this.attempts,
      retries: this.retries,
      refreshes: this.refreshes,
      peakInFlight: this.peakInFlight,
      durations: { count, min, max, avg, total },
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('[Metrics]', JSON.stringify(this.snapshot()));
  }

  reset(): void {
    this.outcomes = emptyOutcomes();
    this.attempts = 0;
    this.retries = 0;
    this.refreshes = 0;
    this.inFlight = 0;
    this.peakInFlight = 0;
    this.durationValues.length = 0;
  }
}

export type { CountedOutcome, RunMetricSnapshot };
