import { copyFile, mkdir, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';
import type { ExecutionContext } from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import type { ErrorClass } from '../anti-blocking/types.js';
import { UnitTimeoutError, errorMessage } from '../errors.js';
import type { UnitArtifact, UnitResult, WorkExecutor } from '../executor/types.js';
import { FailureSnapshotWriter } from '../observability/error-snapshot.js';
import { RunMetrics, type CountedOutcome } from '../observability/metrics.js';
import type { StatusLedger } from '../pipeline/status-ledger.js';
import type { StatusRow, WorkUnit } from '../pipeline/types.js';
import type { SessionPool } from '../session/session-pool.js';
import { unitId, unitLabel } from '../utils/work-unit.js';
import type {
  ChunkReport,
  RunSummary,
  SchedulerConfig,
  SchedulerHooks,
} from './types.js';
import { DEFAULT_SCHEDULER_CONFIG } from './types.js';

const log = createLogger('Scheduler');
const executorLog = createLogger('Executor');

const STAGING_DIR = '.staging';
const ERRORS_DIR = '.errors';

type AttemptOutcome =
  | { kind: 'result'; result: UnitResult }
  | { kind: 'error'; error: unknown };

type RunState = {
  metrics: RunMetrics;
  failures: FailureSnapshotWriter;
};

function toChunks<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Runs units in fixed-size chunks with a concurrency ceiling, recording each
 * outcome in the ledger and rewriting the status report after every chunk.
 *
 * Chunk N+1 never starts before every unit of chunk N has settled and the
 * report has been written. Per-unit errors are logged and left as `fail`;
 * only a session bootstrap failure escapes `run`.
 */
export class BoundedScheduler<C extends ExecutionContext> {
  private readonly ledger: StatusLedger;
  private readonly sessions: SessionPool<C>;
  private readonly executor: WorkExecutor<C>;
  private readonly config: SchedulerConfig;
  private readonly hooks: SchedulerHooks;
  private readonly retryStrategy: RetryStrategy;
  private shutdownRequested: boolean;

  constructor(
    ledger: StatusLedger,
    sessions: SessionPool<C>,
    executor: WorkExecutor<C>,
    config?: Partial<SchedulerConfig>,
    hooks?: SchedulerHooks,
  ) {
    this.ledger = ledger;
    this.sessions = sessions;
    this.executor = executor;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.hooks = hooks ?? {};
    this.retryStrategy = new RetryStrategy({
      maxAttempts: this.config.maxAttempts,
      retryDelayMs: this.config.retryDelayMs,
    });
    this.shutdownRequested = false;
  }

  /** Lets the current chunk finish, then stops. */
  requestStop(): void {
    if (!this.shutdownRequested) {
      this.shutdownRequested = true;
      log.warn('Stop requested, finishing the current chunk');
    }
  }

  async run(units: readonly WorkUnit[]): Promise<RunSummary> {
    this.shutdownRequested = false;

    const metrics = new RunMetrics();
    const pending = units.filter((unit) => !this.ledger.isTerminal(unit));
    const skipped = units.length - pending.length;

    log.info(
      `${units.length} units: ${skipped} already done, ${pending.length} pending`,
    );

    const counts: Record<CountedOutcome, number> = {
      success: 0,
      empty: 0,
      fail: 0,
      skipped: 0,
    };

    if (pending.length === 0) {
      metrics.recordOutcome('skipped', skipped);
      counts.skipped = skipped;
      const rows = this.ledger.snapshot(units);
      log.info('Nothing to do');
      return this.summarize(units, 0, counts, 0, false, rows, metrics);
    }

    await this.sessions.start();

    const failures = new FailureSnapshotWriter({
      directory: this.config.errorSnapshotDir ?? join(this.ledger.root, ERRORS_DIR),
      maxSnapshots: this.config.maxErrorSnapshots,
    });
    failures.initialize();

    const state: RunState = { metrics, failures };
    // Terminal units stay in their chunk and are skipped there.
    const chunks = toChunks(units, this.config.chunkSize);
    let chunksProcessed = 0;
    let rows: StatusRow[] = [];

    const onShutdown = () => {
      this.requestStop();
    };
    if (this.config.handleSignals) {
      process.on('SIGINT', onShutdown);
      process.on('SIGTERM', onShutdown);
    }

    const metricsInterval = setInterval(() => {
      metrics.log(log);
    }, this.config.metricsIntervalMs);

    try {
      for (const [index, chunk] of chunks.entries()) {
        if (this.shutdownRequested) {
          log.warn(`Stopped before chunk ${index + 1}/${chunks.length}`);
          break;
        }

        log.info(`Chunk ${index + 1}/${chunks.length}: ${chunk.length} units`);

        const limit = pLimit(this.config.concurrency);
        const outcomes = await Promise.all(
          chunk.map((unit) => limit(() => this.runUnit(unit, state))),
        );
        for (const outcome of outcomes) {
          counts[outcome] += 1;
        }
        chunksProcessed += 1;

        const chunkRows = this.ledger.snapshot(units);
        await this.notifyChunkComplete({
          index: index + 1,
          total: chunks.length,
          units: chunk,
          rows: chunkRows,
        });
      }
    } finally {
      clearInterval(metricsInterval);
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onShutdown);
        process.removeListener('SIGTERM', onShutdown);
      }

      rows = this.ledger.snapshot(units);
      await this.removeDirectory(join(this.ledger.root, STAGING_DIR));
      await this.sessions.close();

      metrics.log(log);
    }

    return this.summarize(
      units,
      pending.length,
      counts,
      chunksProcessed,
      chunksProcessed < chunks.length,
      rows,
      metrics,
    );
  }

  private async runUnit(unit: WorkUnit, state: RunState): Promise<CountedOutcome> {
    const label = unitLabel(unit);

    if (this.ledger.isTerminal(unit)) {
      log.debug(`${label} already done, skipping`);
      state.metrics.recordOutcome('skipped');
      return 'skipped';
    }

    const stagingPath = join(this.ledger.root, STAGING_DIR, unitId(unit));
    const startedAt = performance.now();
    state.metrics.unitStarted();
    log.debug(`${label} running`);

    let outcome: CountedOutcome;
    try {
      this.ledger.ensureLocation(unit);
      outcome = await this.attemptUntilSettled(unit, stagingPath, state);
    } catch (error) {
      const message = errorMessage(error);
      log.warn(`${label} -> fail: ${message}`);
      this.recordFailure(state, unit, 0, undefined, message);
      outcome = 'fail';
    } finally {
      state.metrics.unitFinished(performance.now() - startedAt);
      await this.removeDirectory(stagingPath);
    }

    state.metrics.recordOutcome(outcome);
    return outcome;
  }

  private async attemptUntilSettled(
    unit: WorkUnit,
    stagingPath: string,
    state: RunState,
  ): Promise<CountedOutcome> {
    const label = unitLabel(unit);

    for (let attempt = 1; ; attempt++) {
      await rm(stagingPath, { recursive: true, force: true });
      await mkdir(stagingPath, { recursive: true });

      state.metrics.recordAttempt();
      const outcome = await this.attempt(unit, stagingPath, attempt);

      if (outcome.kind === 'result') {
        return this.settle(unit, outcome.result, attempt, state);
      }

      const message = errorMessage(outcome.error);
      const errorClass = this.retryStrategy.classify(outcome.error);
      const decision = this.retryStrategy.decide(errorClass, attempt);

      if (!decision.shouldRetry) {
        log.warn(`${label} -> fail (${errorClass} after ${attempt} attempt(s)): ${message}`);
        this.recordFailure(state, unit, attempt, errorClass, message);
        return 'fail';
      }

      log.warn(
        `${label} attempt ${attempt}/${this.retryStrategy.maxAttempts} failed (${errorClass}): ${message}`,
      );
      state.metrics.recordRetry();

      if (decision.refreshSession) {
        state.metrics.recordRefresh();
        try {
          await this.sessions.refresh();
        } catch (refreshError) {
          const refreshMessage = `Session refresh failed: ${errorMessage(refreshError)}`;
          log.error(`${label} -> fail: ${refreshMessage}`);
          this.recordFailure(state, unit, attempt, errorClass, refreshMessage);
          return 'fail';
        }
      }

      if (decision.delayMs > 0) {
        await sleep(decision.delayMs);
      }
    }
  }

  private async attempt(
    unit: WorkUnit,
    stagingPath: string,
    attempt: number,
  ): Promise<AttemptOutcome> {
    const session = this.sessions.acquire();

    try {
      const result = await this.executeWithTimeout(
        unit,
        session.context,
        stagingPath,
        attempt,
      );
      return { kind: 'result', result };
    } catch (error) {
      return { kind: 'error', error };
    } finally {
      this.sessions.release(session);
    }
  }

  /**
   * Races the executor against the unit timeout. On expiry the signal is
   * aborted and the slot stays held until the executor settles or
   * `abortGraceMs` passes, so a timed-out attempt never overlaps the next.
   */
  private async executeWithTimeout(
    unit: WorkUnit,
    context: C,
    stagingPath: string,
    attempt: number,
  ): Promise<UnitResult> {
    const timeoutMs = this.config.unitTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const execution = this.executor.execute(unit, {
      context,
      signal: controller.signal,
      stagingPath,
      attempt,
      log: executorLog,
    });
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const first = await Promise.race([execution, timeout]);
      if (first !== 'timeout') {
        return first;
      }
    } finally {
      clearTimeout(timer);
    }

    const error = new UnitTimeoutError(timeoutMs);
    controller.abort(error);

    if (!(await this.settledWithin(execution, this.config.abortGraceMs))) {
      log.warn(
        `${unitLabel(unit)} still running ${this.config.abortGraceMs}ms after its timeout, releasing its slot`,
      );
    }
    throw error;
  }

  private async settledWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });

    try {
      return await Promise.race([
        work.then(
          () => true,
          (error: unknown) => {
            log.debug('Timed-out attempt settled with:', errorMessage(error));
            return true;
          },
        ),
        grace,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async settle(
    unit: WorkUnit,
    result: UnitResult,
    attempt: number,
    state: RunState,
  ): Promise<CountedOutcome> {
    const label = unitLabel(unit);

    switch (result.status) {
      case 'success': {
        try {
          await this.persistArtifact(unit, result.artifact);
        } catch (error) {
          const message = `Could not store artifact: ${errorMessage(error)}`;
          log.warn(`${label} -> fail: ${message}`);
          this.recordFailure(state, unit, attempt, 'system', message);
          return 'fail';
        }

        if (!this.ledger.markSuccess(unit)) {
          return 'fail';
        }
        log.info(`${label} -> success`);
        return 'success';
      }

      case 'empty':
        if (!this.ledger.markEmpty(unit)) {
          return 'fail';
        }
        log.info(`${label} -> empty${result.reason ? ` (${result.reason})` : ''}`);
        return 'empty';

      case 'failure':
        log.warn(`${label} -> fail: ${result.reason}`);
        this.recordFailure(state, unit, attempt, undefined, result.reason);
        return 'fail';
    }
  }

  private async persistArtifact(unit: WorkUnit, artifact: UnitArtifact): Promise<void> {
    const target = this.ledger.artifactPath(unit);

    if (artifact.kind === 'text') {
      await writeFile(target, artifact.content, 'utf-8');
      return;
    }

    try {
      await rename(artifact.path, target);
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw error;
      }
      await copyFile(artifact.path, target);
      await unlink(artifact.path);
    }
  }

  private recordFailure(
    state: RunState,
    unit: WorkUnit,
    attempts: number,
    errorClass: ErrorClass | undefined,
    message: string,
  ): void {
    state.failures.write(unitId(unit), {
      ...(unit.parentKey === undefined ? {} : { parentKey: unit.parentKey }),
      unitKey: unit.unitKey,
      attempts,
      ...(errorClass === undefined ? {} : { errorClass }),
      errorMessage: message,
      timestamp: Date.now(),
    });
  }

  private async notifyChunkComplete(report: ChunkReport): Promise<void> {
    if (!this.hooks.onChunkComplete) {
      return;
    }

    try {
      await this.hooks.onChunkComplete(report);
    } catch (error) {
      log.error(`Chunk ${report.index} hook failed:`, errorMessage(error));
    }
  }

  private async removeDirectory(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      log.warn(`Could not remove ${path}:`, errorMessage(error));
    }
  }

  private summarize(
    units: readonly WorkUnit[],
    pending: number,
    counts: Record<CountedOutcome, number>,
    chunksProcessed: number,
    interrupted: boolean,
    rows: StatusRow[],
    metrics: RunMetrics,
  ): RunSummary {
    const summary: RunSummary = {
      total: units.length,
      pending,
      skipped: counts.skipped,
      success: counts.success,
      empty: counts.empty,
      fail: counts.fail,
      chunksProcessed,
      interrupted,
      rows,
      metrics: metrics.snapshot(),
    };

    log.info(
      `Run finished: ${summary.success} success, ${summary.empty} empty, ${summary.fail} fail, ${summary.skipped} skipped`,
    );
    return summary;
  }
}
