import {
  DEFAULT_USER_AGENT,
  ProxyLoginProvider,
  type ExecutionContext,
  type ExecutionContextFactory,
  type SessionProvider,
} from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import type { CrawlerConfig } from '../config/config.js';
import { RunMetrics } from '../observability/metrics.js';
import { StatusLedger } from '../pipeline/status-ledger.js';
import { BoundedScheduler } from '../scheduler/bounded-scheduler.js';
import type { RunSummary, SchedulerConfig } from '../scheduler/types.js';
import { SessionPool } from '../session/session-pool.js';
import type { StageDefinition } from './types.js';

const log = createLogger('Stage');

type StageOverrides<C extends ExecutionContext> = {
  provider?: SessionProvider;
  contextFactory?: ExecutionContextFactory<C>;
  scheduler?: Partial<SchedulerConfig>;
};

export function createSessionProvider(config: Readonly<CrawlerConfig>): SessionProvider {
  const { session, browser } = config;
  return new ProxyLoginProvider({
    loginUrl: session.loginUrl,
    redirectUrlPattern: session.redirectUrlPattern,
    username: session.username,
    password: session.password,
    cookiesPath: session.cookiesPath,
    cookieTtlMs: session.cookieTtlMs,
    timeoutMs: session.loginTimeoutMs,
    headless: browser.headless,
    userAgent: browser.userAgent ?? DEFAULT_USER_AGENT,
    ...(browser.channel ? { channel: browser.channel } : {}),
    ...(browser.executablePath ? { executablePath: browser.executablePath } : {}),
  });
}

export function schedulerConfigFrom(config: Readonly<CrawlerConfig>): Partial<SchedulerConfig> {
  return {
    concurrency: config.concurrency,
    chunkSize: config.chunkSize,
    unitTimeoutMs: config.unitTimeoutMs,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    maxErrorSnapshots: config.maxErrorSnapshots,
  };
}

function emptySummary(): RunSummary {
  return {
    total: 0,
    pending: 0,
    skipped: 0,
    success: 0,
    empty: 0,
    fail: 0,
    chunksProcessed: 0,
    interrupted: false,
    rows: [],
    metrics: new RunMetrics().snapshot(),
  };
}

/**
 * Discovers the stage's units and drives them through the shared scheduler.
 * A stage with no input is a no-op: nothing is written and no login happens.
 */
export async function runStage<C extends ExecutionContext>(
  definition: StageDefinition<C>,
  config: Readonly<CrawlerConfig>,
  overrides: StageOverrides<C> = {},
): Promise<RunSummary> {
  log.info(`Stage ${definition.name}: ${definition.description}`);

  const units = await definition.discover(config);
  if (units.length === 0) {
    log.warn(`Stage ${definition.name} has no units. Nothing to do.`);
    return emptySummary();
  }

  const ledger = new StatusLedger(definition.layout(config));
  const pool = new SessionPool(
    overrides.provider ?? createSessionProvider(config),
    overrides.contextFactory ?? definition.createContextFactory(config),
    {
      contexts: config.session.contexts,
      refreshCooldownMs: config.session.refreshCooldownMs,
    },
  );

  const scheduler = new BoundedScheduler(
    ledger,
    pool,
    definition.createExecutor(config),
    { ...schedulerConfigFrom(config), ...overrides.scheduler },
    definition.hooks?.(config, ledger),
  );

  const summary = await scheduler.run(units);
  await definition.afterRun?.(config, ledger);
  return summary;
}

export type { StageOverrides };
