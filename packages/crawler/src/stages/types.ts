import type {
  ExecutionContext,
  ExecutionContextFactory,
} from '@workspace/browser-session';
import type { CrawlerConfig } from '../config/config.js';
import type { WorkExecutor } from '../executor/types.js';
import type { StatusLedger } from '../pipeline/status-ledger.js';
import type { LedgerLayout, WorkUnit } from '../pipeline/types.js';
import type { SchedulerHooks } from '../scheduler/types.js';

type StageName = 'titles' | 'miscited' | 'citing' | 'references';

/**
 * Everything that differs between pipeline stages. The scheduler, ledger
 * and session pool are shared.
 */
type StageDefinition<C extends ExecutionContext> = {
  name: StageName;
  description: string;
  layout(config: Readonly<CrawlerConfig>): LedgerLayout;
  discover(config: Readonly<CrawlerConfig>): Promise<WorkUnit[]>;
  createExecutor(config: Readonly<CrawlerConfig>): WorkExecutor<C>;
  createContextFactory(config: Readonly<CrawlerConfig>): ExecutionContextFactory<C>;
  hooks?(config: Readonly<CrawlerConfig>, ledger: StatusLedger): SchedulerHooks;
  /** Runs once the scheduler returned, including runs with nothing pending. */
  afterRun?(config: Readonly<CrawlerConfig>, ledger: StatusLedger): Promise<void>;
};

export type { StageDefinition, StageName };
