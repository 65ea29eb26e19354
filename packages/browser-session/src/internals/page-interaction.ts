import { errors, type Page } from 'playwright-core';
import type { DownloadOptions, PageInteraction } from './types.js';

const DEFAULT_ACTION_TIMEOUT_MS = 30_000;
const DEFAULT_NAVIGATION_TIMEOUT_MS = 90_000;

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

/**
 * PageInteraction backed by a Playwright page. Timeouts on probing calls
 * are reported as values; timeouts on actions propagate.
 */
export class PlaywrightPageInteraction implements PageInteraction {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(
    url: string,
    timeoutMs = DEFAULT_NAVIGATION_TIMEOUT_MS,
  ): Promise<number | undefined> {
    const response = await this.page.goto(url, {
      waitUntil: 'networkidle',
      timeout: timeoutMs,
    });
    return response?.status();
  }

  async click(
    selector: string,
    timeoutMs = DEFAULT_ACTION_TIMEOUT_MS,
  ): Promise<void> {
    await this.page.locator(selector).click({ timeout: timeoutMs });
  }

  async dispatchClick(
    selector: string,
    timeoutMs = DEFAULT_ACTION_TIMEOUT_MS,
  ): Promise<void> {
    await this.page
      .locator(selector)
      .dispatchEvent('click', undefined, { timeout: timeoutMs });
  }

  async check(
    selector: string,
    timeoutMs = DEFAULT_ACTION_TIMEOUT_MS,
  ): Promise<void> {
    await this.page.locator(selector).check({ timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) {
        return false;
      }
      throw error;
    }
  }

  async textContent(
    selector: string,
    timeoutMs: number,
  ): Promise<string | undefined> {
    try {
      return await this.page.locator(selector).innerText({ timeout: timeoutMs });
    } catch (error) {
      if (isTimeout(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async downloadOnClick(
    selector: string,
    options: DownloadOptions,
  ): Promise<boolean> {
    try {
      const [download] = await Promise.all([
        this.page.waitForEvent('download', { timeout: options.timeoutMs }),
        this.page.locator(selector).click({ timeout: options.timeoutMs }),
      ]);
      await download.saveAs(options.savePath);
      return true;
    } catch (error) {
      if (isTimeout(error)) {
        return false;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
