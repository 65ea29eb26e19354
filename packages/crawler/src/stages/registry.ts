import type { ExecutionContext } from '@workspace/browser-session';
import type { CrawlerConfig } from '../config/config.js';
import type { LedgerLayout, WorkUnit } from '../pipeline/types.js';
import type { RunSummary } from '../scheduler/types.js';
import { citingStage } from './citing.js';
import { miscitedStage } from './miscited.js';
import { referencesStage } from './references.js';
import { runStage } from './run-stage.js';
import { titlesStage } from './titles.js';
import type { StageDefinition, StageName } from './types.js';

/**
 * A stage with its execution context type erased, so stages running on
 * different contexts can share one lookup table.
 */
type RegisteredStage = {
  name: StageName;
  description: string;
  layout(config: Readonly<CrawlerConfig>): LedgerLayout;
  discover(config: Readonly<CrawlerConfig>): Promise<WorkUnit[]>;
  run(config: Readonly<CrawlerConfig>): Promise<RunSummary>;
};

function register<C extends ExecutionContext>(
  definition: StageDefinition<C>,
): RegisteredStage {
  return {
    name: definition.name,
    description: definition.description,
    layout: (config) => definition.layout(config),
    discover: (config) => definition.discover(config),
    run: (config) => runStage(definition, config),
  };
}

const STAGE_NAMES = ['titles', 'miscited', 'citing', 'references'] as const satisfies readonly StageName[];

const STAGES: Record<StageName, RegisteredStage> = {
  titles: register(titlesStage),
  miscited: register(miscitedStage),
  citing: register(citingStage),
  references: register(referencesStage),
};

export function getStage(name: StageName): RegisteredStage {
  return STAGES[name];
}

export { STAGE_NAMES };
export type { RegisteredStage };
