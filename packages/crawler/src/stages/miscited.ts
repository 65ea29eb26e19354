import { join } from 'node:path';
import type { BrowserExecutionContext } from '@workspace/browser-session';
import { discoverFromTable } from '../discovery/work-unit-discovery.js';
import { empty, failure, success } from '../executor/results.js';
import type { ExecutionRequest, UnitResult, WorkExecutor } from '../executor/types.js';
import type { WorkUnit } from '../pipeline/types.js';
import {
  createBrowserFactory,
  normalizeQuery,
  openAuthorized,
  probeResults,
  withPage,
} from './page-actions.js';
import type { StageDefinition } from './types.js';

const INPUT_TABLE = 'eid_with_titles.csv';
const DOWNLOAD_DIR = 'miscited_downloads';

const SELECT_ALL = "input[aria-label='Select all'][type='checkbox']";
const EXPORT_MENU = '.export-dropdown button';
const EXPORT_CSV = "button[data-testid='export-to-csv']";
const SUBMIT_EXPORT = "button[data-testid='submit-export-button']";

export function titleSearchUrl(baseUrl: string, query: string): string {
  const term = encodeURIComponent(`"${query}"`);
  return (
    `${baseUrl}results/results.uri?sort=plf-f&src=dm&s=ALL%28${term}%29` +
    '&limit=10&sessionSearchId=placeholder&origin=searchbasic&sdt=b'
  );
}

/**
 * Searches every field for the exact title and exports the hits. Documents
 * citing the title under another EID are candidate miscitations.
 */
export class MiscitedSearchExecutor implements WorkExecutor<BrowserExecutionContext> {
  private readonly baseUrl: string;
  private readonly downloadTimeoutMs: number;

  constructor(baseUrl: string, downloadTimeoutMs: number) {
    this.baseUrl = baseUrl;
    this.downloadTimeoutMs = downloadTimeoutMs;
  }

  async execute(
    unit: WorkUnit,
    { context, signal, stagingPath }: ExecutionRequest<BrowserExecutionContext>,
  ): Promise<UnitResult> {
    const query = normalizeQuery(unit.attributes.Title ?? '');
    if (!query) {
      return empty('No title to search for');
    }

    return withPage(
      () => context.newPage(),
      async (page) => {
        await openAuthorized(page, titleSearchUrl(this.baseUrl, query));

        const probe = await probeResults(page, { hasResults: SELECT_ALL });
        if (probe === 'no-results') {
          return empty('No documents found');
        }
        if (probe === 'indeterminate') {
          return failure('Search results never loaded');
        }

        await page.check(SELECT_ALL);
        await page.click(EXPORT_MENU);
        await page.click(EXPORT_CSV);

        const savePath = join(stagingPath, `${unit.unitKey}.csv`);
        const saved = await page.downloadOnClick(SUBMIT_EXPORT, {
          savePath,
          timeoutMs: this.downloadTimeoutMs,
        });
        if (!saved) {
          return failure(`Export did not download within ${this.downloadTimeoutMs}ms`);
        }

        return success({ kind: 'file', path: savePath });
      },
      signal,
    );
  }
}

export const miscitedStage: StageDefinition<BrowserExecutionContext> = {
  name: 'miscited',
  description: `Search every title in ${INPUT_TABLE} and export the hits`,
  layout: (config) => ({
    root: join(config.dataDir, DOWNLOAD_DIR),
    unitColumn: 'EID',
    artifactExtension: '.csv',
  }),
  discover: (config) =>
    discoverFromTable(join(config.dataDir, INPUT_TABLE), {
      keyColumn: 'EID',
      attributeColumns: ['Title'],
    }),
  createExecutor: (config) =>
    new MiscitedSearchExecutor(config.baseUrl, config.downloadTimeoutMs),
  createContextFactory: createBrowserFactory,
};
