import { existsSync } from 'node:fs';
import { readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  AuthRejectedError,
  DEFAULT_USER_AGENT,
  isAuthRejectionStatus,
} from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import { discoverFromTable } from '../discovery/work-unit-discovery.js';
import { UnexpectedStatusError } from '../errors.js';
import { empty, failure, success } from '../executor/results.js';
import type { ExecutionRequest, UnitResult, WorkExecutor } from '../executor/types.js';
import type { StatusLedger } from '../pipeline/status-ledger.js';
import type { WorkUnit } from '../pipeline/types.js';
import { formatCsv, readCsvRows } from '../utils/csv.js';
import { isSafePathSegment } from '../utils/work-unit.js';
import {
  HttpContextFactory,
  type HttpExecutionContext,
} from '../web-engine/http-context.js';
import type { StageDefinition } from './types.js';

const log = createLogger('TitlesStage');

const INPUT_TABLE = 'eid.csv';
const TITLES_TABLE = 'eid_with_titles.csv';
const DOWNLOAD_DIR = 'title_downloads';
const EID_COLUMN = 'EID';
const TITLE_COLUMN = 'Title';
const REQUEST_TIMEOUT_MS = 10_000;

const documentSchema = z.object({
  titles: z.array(z.string()).optional(),
});

export function documentUrl(baseUrl: string, eid: string): string {
  return `${baseUrl}gateway/doc-details/documents/${encodeURIComponent(eid)}`;
}

/**
 * Looks up the document title through the JSON document-details endpoint.
 * A login page served instead of JSON means the session has lapsed.
 */
export class TitleFetchExecutor implements WorkExecutor<HttpExecutionContext> {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl;
  }

  async execute(
    unit: WorkUnit,
    { context, signal }: ExecutionRequest<HttpExecutionContext>,
  ): Promise<UnitResult> {
    const response = await context.getJson(documentUrl(this.baseUrl, unit.unitKey), signal);

    if (isAuthRejectionStatus(response.status)) {
      throw new AuthRejectedError(
        `Document lookup rejected with HTTP ${response.status}`,
        response.status,
      );
    }
    if (response.status === 404) {
      return empty('404 Not Found');
    }
    if (response.status !== 200) {
      throw new UnexpectedStatusError(response.status);
    }
    if (typeof response.data === 'string') {
      throw new AuthRejectedError('Document lookup returned a non-JSON page');
    }

    const parsed = documentSchema.safeParse(response.data);
    if (!parsed.success) {
      return failure('Unexpected document payload');
    }

    const title = parsed.data.titles?.[0]?.trim();
    if (!title) {
      return empty('Title not found');
    }

    return success({ kind: 'text', content: title });
  }
}

async function fetchedTitle(ledger: StatusLedger, eid: string): Promise<string | undefined> {
  if (!isSafePathSegment(eid)) {
    return undefined;
  }

  const unit: WorkUnit = { unitKey: eid, attributes: {} };
  if (ledger.outcomeOf(unit) !== 'success') {
    return undefined;
  }

  return (await readFile(ledger.artifactPath(unit), 'utf-8')).trim();
}

/**
 * Rewrites the input table with a `Title` column filled from the fetched
 * titles. Rows without a fetched title keep whatever title they had.
 */
export async function writeTitlesTable(
  inputFile: string,
  outputFile: string,
  ledger: StatusLedger,
): Promise<number> {
  if (!existsSync(inputFile)) {
    log.warn(`Input table '${inputFile}' not found, titles table not written`);
    return 0;
  }

  const rows = await readCsvRows(inputFile);
  const columns = rows[0] ? Object.keys(rows[0]) : [EID_COLUMN];
  const header = columns.includes(TITLE_COLUMN) ? columns : [...columns, TITLE_COLUMN];

  const lines: string[][] = [];
  for (const row of rows) {
    const eid = (row[EID_COLUMN] ?? '').trim();
    const title = (eid ? await fetchedTitle(ledger, eid) : undefined) ?? row[TITLE_COLUMN] ?? '';
    lines.push(header.map((column) => (column === TITLE_COLUMN ? title : row[column] ?? '')));
  }

  const tempFile = `${outputFile}.tmp`;
  await writeFile(tempFile, formatCsv(header, lines), 'utf-8');
  await rename(tempFile, outputFile);

  log.info(`Wrote ${lines.length} rows to ${outputFile}`);
  return lines.length;
}

function tablePaths(dataDir: string) {
  return {
    input: join(dataDir, INPUT_TABLE),
    output: join(dataDir, TITLES_TABLE),
  };
}

export const titlesStage: StageDefinition<HttpExecutionContext> = {
  name: 'titles',
  description: `Fetch document titles for ${INPUT_TABLE} and write ${TITLES_TABLE}`,
  layout: (config) => ({
    root: join(config.dataDir, DOWNLOAD_DIR),
    unitColumn: EID_COLUMN,
    artifactExtension: '.txt',
  }),
  discover: (config) =>
    discoverFromTable(tablePaths(config.dataDir).input, { keyColumn: EID_COLUMN }),
  createExecutor: (config) => new TitleFetchExecutor(config.baseUrl),
  createContextFactory: (config) =>
    new HttpContextFactory({
      userAgent: config.browser.userAgent ?? DEFAULT_USER_AGENT,
      timeoutMs: REQUEST_TIMEOUT_MS,
    }),
  hooks: (config, ledger) => ({
    onChunkComplete: async () => {
      const { input, output } = tablePaths(config.dataDir);
      await writeTitlesTable(input, output, ledger);
    },
  }),
  afterRun: async (config, ledger) => {
    const { input, output } = tablePaths(config.dataDir);
    await writeTitlesTable(input, output, ledger);
  },
};
