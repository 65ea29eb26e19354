import { z } from 'zod';
import type { EnvSource } from '../config/config.js';
import { errorMessage } from '../errors.js';
import { StatusLedger } from '../pipeline/status-ledger.js';
import type { UnitOutcome } from '../pipeline/types.js';
import { STAGE_NAMES, getStage } from '../stages/registry.js';
import type { StageName } from '../stages/types.js';
import { crawlArgsSchema, resolveConfig } from './crawl.js';

const statusArgsSchema = z.object({
  stage: z.enum(STAGE_NAMES, {
    errorMap: () => ({
      message: `Missing or invalid --stage. Use one of: ${STAGE_NAMES.join(', ')}.`,
    }),
  }),
  ...crawlArgsSchema.shape,
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type OutcomeCounts = Record<UnitOutcome, number>;

export function countOutcomes(outcomes: Iterable<UnitOutcome>): OutcomeCounts {
  const counts: OutcomeCounts = { not_started: 0, success: 0, empty: 0, fail: 0 };
  for (const outcome of outcomes) {
    counts[outcome] += 1;
  }
  return counts;
}

export function formatStatus(
  stage: StageName,
  counts: OutcomeCounts,
  source: string,
): string {
  const total = counts.not_started + counts.success + counts.empty + counts.fail;
  return [
    `Stage ${stage}: ${total} units (${source})`,
    `  success:     ${counts.success}`,
    `  empty:       ${counts.empty}`,
    `  fail:        ${counts.fail}`,
    `  not_started: ${counts.not_started}`,
  ].join('\n');
}

/**
 * Prints per-outcome counts for a stage. Live markers are read when the
 * stage input is present; otherwise the last written report is used.
 * Nothing is written.
 */
export async function runStatusAction(
  args: StatusArgs,
  env: EnvSource = process.env,
): Promise<number> {
  const config = resolveConfig(args, env);
  if (!config) {
    return 1;
  }

  const stage = getStage(args.stage);
  const ledger = new StatusLedger(stage.layout(config));

  try {
    const units = await stage.discover(config);
    if (units.length > 0) {
      const counts = countOutcomes(units.map((unit) => ledger.outcomeOf(unit)));
      console.log(formatStatus(args.stage, counts, 'live'));
      return 0;
    }

    const rows = await ledger.readSnapshot();
    const counts = countOutcomes(rows.map((row) => row.status));
    console.log(formatStatus(args.stage, counts, ledger.reportPath));
    return 0;
  } catch (error) {
    console.error(`Could not read status: ${errorMessage(error)}`);
    return 1;
  }
}

export { statusArgsSchema };
export type { OutcomeCounts, StatusArgs };
