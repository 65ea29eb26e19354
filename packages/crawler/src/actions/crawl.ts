import { isLogLevel, log, setLogLevel, type LogLevel } from '@workspace/logger';
import { z } from 'zod';
import { loadConfig, type CrawlerConfig, type EnvSource } from '../config/config.js';
import { ConfigError, SessionBootstrapError, errorMessage } from '../errors.js';
import type { RunSummary } from '../scheduler/types.js';
import { getStage } from '../stages/registry.js';
import type { StageName } from '../stages/types.js';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function positiveIntegerOption(name: string) {
  return z.coerce
    .number({ invalid_type_error: `Invalid --${name}. Provide an integer.` })
    .int(`Invalid --${name}. Provide an integer.`)
    .min(1, `Invalid --${name}. Provide an integer >= 1.`)
    .optional();
}

const crawlArgsSchema = z.object({
  dataDir: z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, 'Invalid --dataDir path').optional(),
    )
    .optional(),
  concurrency: positiveIntegerOption('concurrency'),
  chunkSize: positiveIntegerOption('chunkSize'),
  headless: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      booleanFromCliSchema,
    )
    .optional(),
  logLevel: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine((value): value is LogLevel => isLogLevel(value), {
      message: 'Invalid --logLevel. Use fatal, error, warn, info, debug, trace or silent.',
    })
    .optional(),
});

type CrawlArgs = z.infer<typeof crawlArgsSchema>;

/**
 * Turns parsed CLI options into the frozen run configuration. Errors are
 * printed; `undefined` means the command should exit with 1.
 */
export function resolveConfig(
  args: CrawlArgs,
  env: EnvSource,
): Readonly<CrawlerConfig> | undefined {
  try {
    const config = loadConfig(env, {
      ...(args.dataDir === undefined ? {} : { dataDir: args.dataDir }),
      ...(args.concurrency === undefined ? {} : { concurrency: args.concurrency }),
      ...(args.chunkSize === undefined ? {} : { chunkSize: args.chunkSize }),
      ...(args.headless === undefined ? {} : { headless: args.headless }),
      ...(args.logLevel === undefined ? {} : { logLevel: args.logLevel }),
    });
    setLogLevel(config.logLevel);
    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Invalid configuration: ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

export function formatSummary(stage: StageName, summary: RunSummary): string {
  return [
    `Stage ${stage}${summary.interrupted ? ' (interrupted)' : ''}`,
    `  units:   ${summary.total} (${summary.pending} pending at start)`,
    `  success: ${summary.success}`,
    `  empty:   ${summary.empty}`,
    `  fail:    ${summary.fail}`,
    `  skipped: ${summary.skipped}`,
  ].join('\n');
}

export async function runCrawlAction(
  stage: StageName,
  args: CrawlArgs,
  env: EnvSource = process.env,
): Promise<number> {
  const config = resolveConfig(args, env);
  if (!config) {
    return 1;
  }

  const startTime = Date.now();
  log.info('Starting crawl action', JSON.stringify({ stage, dataDir: config.dataDir }));

  try {
    const summary = await getStage(stage).run(config);
    console.log(formatSummary(stage, summary));
    log.info(`Crawl action finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    if (error instanceof SessionBootstrapError) {
      log.fatal(`Could not start a session: ${error.message}`);
      return 1;
    }

    log.error('Crawl action failed:', errorMessage(error));
    return 1;
  }
}

export { crawlArgsSchema };
export type { CrawlArgs };
