import { join } from 'node:path';
import type { BrowserExecutionContext } from '@workspace/browser-session';
import { discoverFromParentTables } from '../discovery/work-unit-discovery.js';
import { empty, failure, success } from '../executor/results.js';
import type { ExecutionRequest, UnitResult, WorkExecutor } from '../executor/types.js';
import type { WorkUnit } from '../pipeline/types.js';
import {
  createBrowserFactory,
  openAuthorized,
  probeResults,
  withPage,
} from './page-actions.js';
import type { StageDefinition } from './types.js';

const INPUT_DIR = 'miscited_downloads';
const DOWNLOAD_DIR = 'citing_downloads';

const SELECT_ALL = "label[for='mainResults-allPageCheckBox']";
const EXPORT_MENU = 'button#export_results';
const CSV_FORMAT = "label[for='CSV']";
const EXPORT_TRIGGER = 'button#exportTrigger';

export function citedByUrl(baseUrl: string, eid: string): string {
  return `${baseUrl}search/submit/citedby.uri?eid=${encodeURIComponent(eid)}&src=s&origin=resultslist`;
}

/**
 * Exports the documents citing one miscited record.
 */
export class CitingExportExecutor implements WorkExecutor<BrowserExecutionContext> {
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
    return withPage(
      () => context.newPage(),
      async (page) => {
        await openAuthorized(page, citedByUrl(this.baseUrl, unit.unitKey));

        const probe = await probeResults(page, { hasResults: SELECT_ALL });
        if (probe === 'no-results') {
          return empty('No citing documents');
        }
        if (probe === 'indeterminate') {
          return failure('Select-all checkbox not found');
        }

        // The label is covered by an overlay; a real click lands on the overlay.
        await page.dispatchClick(SELECT_ALL);
        await page.click(EXPORT_MENU);
        await page.click(CSV_FORMAT);

        const savePath = join(stagingPath, `${unit.unitKey}.csv`);
        const saved = await page.downloadOnClick(EXPORT_TRIGGER, {
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

export const citingStage: StageDefinition<BrowserExecutionContext> = {
  name: 'citing',
  description: `Export the documents citing each record listed under ${INPUT_DIR}`,
  layout: (config) => ({
    root: join(config.dataDir, DOWNLOAD_DIR),
    parentColumn: 'CitedEID',
    unitColumn: 'MiscitedEID',
    artifactExtension: '.csv',
  }),
  discover: (config) =>
    discoverFromParentTables(join(config.dataDir, INPUT_DIR), { keyColumn: 'EID' }),
  createExecutor: (config) =>
    new CitingExportExecutor(config.baseUrl, config.downloadTimeoutMs),
  createContextFactory: createBrowserFactory,
};
