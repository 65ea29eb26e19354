import {
  AuthRejectedError,
  PlaywrightContextFactory,
  isAuthRejectionStatus,
  type PageInteraction,
} from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import type { CrawlerConfig } from '../config/config.js';
import { errorMessage } from '../errors.js';
import type { ProbeResult } from '../executor/types.js';

const log = createLogger('PageActions');

const NO_RESULTS_SELECTOR = "span[data-testid='no-results-with-suggestion']";
const DEFAULT_PROBE_TIMEOUT_MS = 5000;

/**
 * Lowercases a title and collapses every run of non-alphanumeric characters
 * into one space, so it can be embedded in a quoted search term.
 */
export function normalizeQuery(title: string): string {
  return title.toLowerCase().replace(/[^a-zA-Z0-9]+/g, ' ').trim();
}

export async function openAuthorized(
  page: PageInteraction,
  url: string,
): Promise<void> {
  const status = await page.goto(url);
  if (status !== undefined && isAuthRejectionStatus(status)) {
    throw new AuthRejectedError(`Navigation rejected with HTTP ${status}`, status);
  }
}

type ProbeSelectors = {
  /** Present only when the page lists results. */
  hasResults: string;
  noResults?: string;
};

/**
 * Waits for whichever marker shows up first. Neither within the timeout
 * means the page never settled.
 */
export function probeResults(
  page: PageInteraction,
  selectors: ProbeSelectors,
  timeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
): Promise<ProbeResult> {
  const candidates: [string, ProbeResult][] = [
    [selectors.hasResults, 'has-results'],
    [selectors.noResults ?? NO_RESULTS_SELECTOR, 'no-results'],
  ];

  return new Promise((resolve, reject) => {
    let remaining = candidates.length;

    for (const [selector, answer] of candidates) {
      page.waitForSelector(selector, timeoutMs).then(
        (found) => {
          remaining -= 1;
          if (found) {
            resolve(answer);
          } else if (remaining === 0) {
            resolve('indeterminate');
          }
        },
        reject,
      );
    }
  });
}

/**
 * Runs `action` on a fresh page and always closes it. Aborting `signal`
 * closes the page early, which rejects whatever the action is waiting on.
 */
export async function withPage<T>(
  openPage: () => Promise<PageInteraction>,
  action: (page: PageInteraction) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  signal?.throwIfAborted();
  const page = await openPage();

  const closeOnAbort = () => {
    page.close().catch((error: unknown) => {
      log.warn('Could not close page after abort:', errorMessage(error));
    });
  };
  signal?.addEventListener('abort', closeOnAbort, { once: true });

  try {
    signal?.throwIfAborted();
    return await action(page);
  } finally {
    signal?.removeEventListener('abort', closeOnAbort);
    await page.close();
  }
}

export function createBrowserFactory(
  config: Readonly<CrawlerConfig>,
): PlaywrightContextFactory {
  const { headless, userAgent, channel, executablePath } = config.browser;
  return new PlaywrightContextFactory({
    headless,
    ...(userAgent ? { userAgent } : {}),
    ...(channel ? { channel } : {}),
    ...(executablePath ? { executablePath } : {}),
  });
}

export { DEFAULT_PROBE_TIMEOUT_MS, NO_RESULTS_SELECTOR };
export type { ProbeSelectors };
