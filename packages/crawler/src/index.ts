export {
  loadConfig,
  type BrowserSettings,
  type CliOverrides,
  type CrawlerConfig,
  type EnvSource,
  type SessionSettings
} from "./config/config.js";
export {
  ConfigError,
  SessionBootstrapError,
  UnexpectedStatusError,
  UnitTimeoutError,
  errorMessage
} from "./errors.js";
export {
  discoverFromParentTables,
  discoverFromTable,
  discoverFromUnitTables,
  WorkUnitCollector,
  type TableDiscoveryOptions
} from "./discovery/work-unit-discovery.js";
export {
  StatusLedger,
  EMPTY_MARKER,
  SUCCESS_MARKER
} from "./pipeline/status-ledger.js";
export type {
  LedgerLayout,
  StatusRow,
  UnitOutcome,
  WorkUnit
} from "./pipeline/types.js";
export { SessionPool } from "./session/session-pool.js";
export type {
  SessionInfo,
  SessionPoolConfig,
  SessionPoolStats
} from "./session/types.js";
export { BoundedScheduler } from "./scheduler/bounded-scheduler.js";
export {
  DEFAULT_SCHEDULER_CONFIG,
  type ChunkReport,
  type RunSummary,
  type SchedulerConfig,
  type SchedulerHooks
} from "./scheduler/types.js";
export { RetryStrategy } from "./anti-blocking/retry-strategy.js";
export type { ErrorClass, RetryDecision } from "./anti-blocking/types.js";
export { empty, failure, success } from "./executor/results.js";
export type {
  ExecutionRequest,
  ProbeResult,
  UnitArtifact,
  UnitResult,
  WorkExecutor
} from "./executor/types.js";
export { RunMetrics, type RunMetricSnapshot } from "./observability/metrics.js";
export { HttpContextFactory, HttpExecutionContext } from "./web-engine/http-context.js";
export { runStage, type StageOverrides } from "./stages/run-stage.js";
export { getStage, STAGE_NAMES, type RegisteredStage } from "./stages/registry.js";
export type { StageDefinition, StageName } from "./stages/types.js";
export { normalizeQuery } from "./stages/page-actions.js";
