import { randomUUID } from 'node:crypto';
import {
  chromium,
  type Browser,
  type BrowserContext,
  type LaunchOptions,
} from 'playwright-core';
import { createLogger } from '@workspace/logger';
import { PlaywrightPageInteraction } from './page-interaction.js';
import type {
  BrowserExecutionContext,
  Credentials,
  ExecutionContextFactory,
  PageInteraction,
} from './types.js';

const log = createLogger('PlaywrightContext');

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

type PlaywrightContextOptions = {
  headless: boolean;
  userAgent: string;
  /** Installed browser channel (e.g. `chrome`) or an explicit executable. */
  channel?: string;
  executablePath?: string;
};

const DEFAULT_CONTEXT_OPTIONS: PlaywrightContextOptions = {
  headless: true,
  userAgent: DEFAULT_USER_AGENT,
};

function toLaunchOptions(options: PlaywrightContextOptions): LaunchOptions {
  return {
    headless: options.headless,
    channel: options.channel,
    executablePath: options.executablePath,
  };
}

export class PlaywrightExecutionContext implements BrowserExecutionContext {
  readonly id: string;
  private readonly context: BrowserContext;

  constructor(context: BrowserContext) {
    this.id = randomUUID();
    this.context = context;
  }

  async newPage(): Promise<PageInteraction> {
    const page = await this.context.newPage();
    return new PlaywrightPageInteraction(page);
  }

  async applyCredentials(credentials: Credentials): Promise<void> {
    await this.context.clearCookies();
    if (credentials.cookies.length > 0) {
      await this.context.addCookies(credentials.cookies);
    }
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * Launches one Chromium instance lazily and hands out isolated browser
 * contexts carrying the session cookies.
 */
export class PlaywrightContextFactory
  implements ExecutionContextFactory<PlaywrightExecutionContext>
{
  private readonly options: PlaywrightContextOptions;
  private browser: Browser | undefined;

  constructor(options?: Partial<PlaywrightContextOptions>) {
    this.options = { ...DEFAULT_CONTEXT_OPTIONS, ...options };
  }

  async create(credentials: Credentials): Promise<PlaywrightExecutionContext> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      userAgent: this.options.userAgent,
      acceptDownloads: true,
    });

    const executionContext = new PlaywrightExecutionContext(context);
    await executionContext.applyCredentials(credentials);
    log.info(
      `Created browser context ${executionContext.id} with ${credentials.cookies.length} cookies`,
    );
    return executionContext;
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = undefined;
    }
  }

  private async getBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = await chromium.launch(toLaunchOptions(this.options));
    }
    return this.browser;
  }
}

export { DEFAULT_USER_AGENT };
export type { PlaywrightContextOptions };
