import type { RunMetricSnapshot } from '../observability/metrics.js';
import type { StatusRow, WorkUnit } from '../pipeline/types.js';

type SchedulerConfig = {
  /** Units in flight at once, across all contexts. */
  concurrency: number;
  /** Units per chunk; the report is rewritten after every chunk. */
  chunkSize: number;
  unitTimeoutMs: number;
  /**
   * How long a timed-out attempt keeps its slot while the executor winds
   * down after the abort.
   */
  abortGraceMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  /** Defaults to `<ledger root>/.errors`. */
  errorSnapshotDir?: string;
  maxErrorSnapshots: number;
  metricsIntervalMs: number;
  /** Stop after the current chunk on SIGINT/SIGTERM. */
  handleSignals: boolean;
};

type ChunkReport = {
  /** 1-based. */
  index: number;
  total: number;
  units: readonly WorkUnit[];
  rows: readonly StatusRow[];
};

type SchedulerHooks = {
  onChunkComplete?: (report: ChunkReport) => void | Promise<void>;
};

type RunSummary = {
  total: number;
  /** Units that still needed work when the run started. */
  pending: number;
  skipped: number;
  success: number;
  empty: number;
  fail: number;
  chunksProcessed: number;
  interrupted: boolean;
  rows: StatusRow[];
  metrics: RunMetricSnapshot;
};

const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  concurrency: 5,
  chunkSize: 100,
  unitTimeoutMs: 10 * 60_000,
  abortGraceMs: 30_000,
  maxAttempts: 5,
  retryDelayMs: 1000,
  maxErrorSnapshots: 500,
  metricsIntervalMs: 30_000,
  handleSignals: true,
};

export type { ChunkReport, RunSummary, SchedulerConfig, SchedulerHooks };
export { DEFAULT_SCHEDULER_CONFIG };
