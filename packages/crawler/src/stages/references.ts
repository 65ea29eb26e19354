import { join } from 'node:path';
import type { BrowserExecutionContext, PageInteraction } from '@workspace/browser-session';
import { discoverFromUnitTables } from '../discovery/work-unit-discovery.js';
import { empty, failure, success } from '../executor/results.js';
import type {
  ExecutionRequest,
  ProbeResult,
  UnitResult,
  WorkExecutor,
} from '../executor/types.js';
import type { WorkUnit } from '../pipeline/types.js';
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  NO_RESULTS_SELECTOR,
  createBrowserFactory,
  openAuthorized,
  withPage,
} from './page-actions.js';
import type { StageDefinition } from './types.js';

const INPUT_DIR = 'citing_downloads';
const DOWNLOAD_DIR = 'references_of_citing_download';

const COUNT_HEADER = '.documentHeader span#pageTitleHeader';
const SELECT_ALL = "label[for='mainResults-allPageCheckBox']";
const EXPORT_MENU = 'button#export_results';
const CSV_FORMAT = "label[for='CSV']";
const EXPORT_TRIGGER = 'button#exportTrigger';
/** Exports only the first 2000 references; offered when the full export stalls. */
const CHUNK_EXPORT_TRIGGER = 'button#chunkExportTrigger';

type ReferenceCount =
  | { probe: Exclude<ProbeResult, 'indeterminate'>; count: number }
  | { probe: 'indeterminate'; text?: string };

/**
 * Document ids look like `2-s2.0-85012345678`; the reference search keys on
 * the last segment.
 */
export function citeIdOf(eid: string): string | undefined {
  const segment = eid.split('-')[2];
  return segment && /^\d+$/.test(segment) ? segment : undefined;
}

export function referencesUrl(baseUrl: string, eid: string, citeId: string): string {
  return `${baseUrl}results/references.uri?src=r&sot=rec&s=CITEID(${citeId})&citingId=${encodeURIComponent(eid)}`;
}

export function parseReferenceCount(text: string): number | undefined {
  const digits = /(\d[\d,]*)\s+reference/.exec(text.toLowerCase())?.[1];
  return digits === undefined ? undefined : Number(digits.replace(/,/g, ''));
}

async function readReferenceCount(page: PageInteraction): Promise<ReferenceCount> {
  const text = await page.textContent(COUNT_HEADER, DEFAULT_PROBE_TIMEOUT_MS);

  if (text === undefined) {
    const noResults = await page.waitForSelector(NO_RESULTS_SELECTOR, 500);
    return noResults ? { probe: 'no-results', count: 0 } : { probe: 'indeterminate' };
  }

  const count = parseReferenceCount(text);
  if (count === undefined) {
    return { probe: 'indeterminate', text };
  }
  return count === 0 ? { probe: 'no-results', count } : { probe: 'has-results', count };
}

/**
 * Exports the reference list of one citing document.
 */
export class ReferencesExportExecutor implements WorkExecutor<BrowserExecutionContext> {
  private readonly baseUrl: string;
  private readonly downloadTimeoutMs: number;

  constructor(baseUrl: string, downloadTimeoutMs: number) {
    this.baseUrl = baseUrl;
    this.downloadTimeoutMs = downloadTimeoutMs;
  }

  async execute(
    unit: WorkUnit,
    { context, signal, stagingPath, log }: ExecutionRequest<BrowserExecutionContext>,
  ): Promise<UnitResult> {
    const citeId = citeIdOf(unit.unitKey);
    if (citeId === undefined) {
      return failure(`Malformed document id: ${unit.unitKey}`);
    }

    return withPage(
      () => context.newPage(),
      async (page) => {
        await openAuthorized(page, referencesUrl(this.baseUrl, unit.unitKey, citeId));

        const references = await readReferenceCount(page);
        if (references.probe === 'indeterminate') {
          return failure(
            references.text === undefined
              ? 'Reference count header not found'
              : `Could not read a reference count from "${references.text}"`,
          );
        }
        if (references.probe === 'no-results') {
          return empty('No references');
        }

        log.debug(`[${unit.unitKey}] ${references.count} references`);

        await page.dispatchClick(SELECT_ALL);
        await page.click(EXPORT_MENU);
        await page.click(CSV_FORMAT);

        const download = {
          savePath: join(stagingPath, `${unit.unitKey}.csv`),
          timeoutMs: this.downloadTimeoutMs,
        };

        if (await page.downloadOnClick(EXPORT_TRIGGER, download)) {
          return success({ kind: 'file', path: download.savePath });
        }

        log.info(`[${unit.unitKey}] Full export timed out, exporting the first 2000 references`);
        if (await page.downloadOnClick(CHUNK_EXPORT_TRIGGER, download)) {
          return success({ kind: 'file', path: download.savePath });
        }

        return failure(`Export did not download within ${this.downloadTimeoutMs}ms`);
      },
      signal,
    );
  }
}

export const referencesStage: StageDefinition<BrowserExecutionContext> = {
  name: 'references',
  description: `Export the references of every citing document under ${INPUT_DIR}`,
  layout: (config) => ({
    root: join(config.dataDir, DOWNLOAD_DIR),
    unitColumn: 'CitingEID',
    artifactExtension: '.csv',
  }),
  discover: (config) =>
    discoverFromUnitTables(join(config.dataDir, INPUT_DIR), {
      keyColumn: 'EID',
      attributeColumns: ['Title', 'Link'],
    }),
  createExecutor: (config) =>
    new ReferencesExportExecutor(config.baseUrl, config.downloadTimeoutMs),
  createContextFactory: createBrowserFactory,
};
