#!/usr/bin/env node
import 'dotenv/config';
import { z } from 'zod';
import { crawlArgsSchema, runCrawlAction } from './actions/crawl.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';
import { STAGE_NAMES } from './stages/registry.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const optionsSchema = z.record(z.string(), z.string());

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('help'), options: optionsSchema }),
  z.object({ command: z.enum(STAGE_NAMES), options: optionsSchema }),
  z.object({ command: z.literal('status'), options: optionsSchema }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`citation-crawler CLI

Usage:
  cli help
  cli titles
  cli miscited --concurrency=5 --chunkSize=100
  cli citing --headless=false
  cli references --dataDir="./data" --logLevel=debug
  cli status --stage=citing

Commands:
  help        Show this help message
  titles      Fetch titles for eid.csv and write eid_with_titles.csv
  miscited    Search each title and export the matching documents
  citing      Export the documents citing each miscited record
  references  Export the references of each citing document
  status      Print outcome counts for a stage without running it

Options (every command except help):
  --dataDir      Directory holding the inputs and download folders (default: CRAWLER_DATA_DIR or .).
  --concurrency  Units in flight at once (default: CRAWLER_CONCURRENCY or 5).
  --chunkSize    Units per chunk; the status report is rewritten after each (default: 100).
  --headless     Use false to show the browser (default: true).
  --logLevel     fatal, error, warn, info, debug, trace or silent (default: LOG_LEVEL or info).

Status options:
  --stage  Required. One of: ${STAGE_NAMES.join(', ')}.

Credentials are read from SCOPUS_USERNAME, SCOPUS_PASSWORD, SCOPUS_LOGIN_URL and
SCOPUS_REDIRECT_PATTERN (a .env file is loaded when present).
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  const input = parsedCliInput.data;

  if (input.command === 'help') {
    printHelp();
    return 0;
  }

  if (input.command === 'status') {
    const parsedStatusArgs = statusArgsSchema.safeParse(input.options);
    if (!parsedStatusArgs.success) {
      console.error(
        parsedStatusArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runStatusAction(parsedStatusArgs.data);
  }

  const parsedCrawlArgs = crawlArgsSchema.safeParse(input.options);
  if (!parsedCrawlArgs.success) {
    console.error(
      parsedCrawlArgs.error.issues[0]?.message ?? 'Invalid arguments',
    );
    printHelp();
    return 1;
  }

  return runCrawlAction(input.command, parsedCrawlArgs.data);
}

const exitCode = await main();
process.exitCode = exitCode;
