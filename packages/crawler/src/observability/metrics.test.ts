import { describe, it, expect, vi } from 'vitest';
import { RunMetrics } from './metrics.js';

describe('RunMetrics', () => {
  it('counts outcomes', () => {
    const metrics = new RunMetrics();
    metrics.recordOutcome('success');
    metrics.recordOutcome('success');
    metrics.recordOutcome('empty');
    metrics.recordOutcome('skipped', 40);

    expect(metrics.snapshot().outcomes).toEqual({
      success: 2,
      empty: 1,
      fail: 0,
      skipped: 40,
    });
  });

  it('tracks peak in-flight units', () => {
    const metrics = new RunMetrics();
    metrics.unitStarted();
    metrics.unitStarted();
    metrics.unitStarted();
    metrics.unitFinished(10);
    metrics.unitStarted();

    expect(metrics.snapshot().peakInFlight).toBe(3);
  });

  it('records unit durations with min/max/avg', () => {
    const metrics = new RunMetrics();
    metrics.unitStarted();
    metrics.unitFinished(100);
    metrics.unitStarted();
    metrics.unitFinished(300);

    expect(metrics.snapshot().durations).toEqual({
      count: 2,
      min: 100,
      max: 300,
      avg: 200,
      total: 400,
    });
  });

  it('counts attempts, retries and refreshes', () => {
    const metrics = new RunMetrics();
    metrics.recordAttempt();
    metrics.recordAttempt();
    metrics.recordRetry();
    metrics.recordRefresh();

    const snap = metrics.snapshot();
    expect(snap.attempts).toBe(2);
    expect(snap.retries).toBe(1);
    expect(snap.refreshes).toBe(1);
  });

  it('log writes the snapshot as JSON', () => {
    const metrics = new RunMetrics();
    metrics.recordOutcome('fail');
    const info = vi.fn();

    metrics.log({ info });

    expect(info).toHaveBeenCalledWith('[Metrics]', JSON.stringify(metrics.snapshot()));
  });

  it('reset clears state', () => {
    const metrics = new RunMetrics();
    metrics.recordOutcome('success');
    metrics.unitStarted();
    metrics.unitFinished(5);

    metrics.reset();

    const snap = metrics.snapshot();
    expect(snap.outcomes.success).toBe(0);
    expect(snap.peakInFlight).toBe(0);
    expect(snap.durations.count).toBe(0);
  });
});
