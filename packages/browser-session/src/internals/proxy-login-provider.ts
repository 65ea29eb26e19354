import { chromium } from 'playwright-core';
import { createLogger } from '@workspace/logger';
import { CookieStore } from './cookie-store.js';
import { LoginError } from './errors.js';
import { DEFAULT_USER_AGENT } from './playwright-context.js';
import type { Credentials, SessionProvider, StoredCookie } from './types.js';

const log = createLogger('ProxyLogin');

type LoginFlowOptions = {
  loginUrl: string;
  /** Glob the browser must land on once the proxy accepted the login. */
  redirectUrlPattern: string;
  username: string;
  password: string;
  headless: boolean;
  userAgent: string;
  channel?: string;
  executablePath?: string;
  timeoutMs: number;
};

type LoginRunner = (options: LoginFlowOptions) => Promise<StoredCookie[]>;

type ProxyLoginProviderOptions = Omit<
  LoginFlowOptions,
  'username' | 'password' | 'loginUrl' | 'redirectUrlPattern'
> & {
  loginUrl: string | undefined;
  redirectUrlPattern: string | undefined;
  username: string | undefined;
  password: string | undefined;
  cookiesPath: string;
  /** Stored cookies older than this are not reused at startup. */
  cookieTtlMs: number;
};

const USERNAME_SELECTOR = 'input[name="cred_userid_inputtext"]';
const PASSWORD_SELECTOR = 'input[name="cred_password_inputtext"]';
const SUBMIT_SELECTOR = 'input[value="Login"]';

/**
 * Library proxy login in a throwaway headless browser; returns its cookies.
 */
const runProxyLogin: LoginRunner = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    channel: options.channel,
    executablePath: options.executablePath,
  });

  try {
    const context = await browser.newContext({ userAgent: options.userAgent });
    const page = await context.newPage();

    log.info('Navigating to the login page...');
    await page.goto(options.loginUrl, { timeout: options.timeoutMs });

    await page.fill(USERNAME_SELECTOR, options.username);
    await page.fill(PASSWORD_SELECTOR, options.password);
    await page.click(SUBMIT_SELECTOR);

    log.info('Waiting for redirect to the proxied site...');
    await page.waitForURL(options.redirectUrlPattern, {
      timeout: options.timeoutMs,
    });
    log.info(`Redirected to: ${page.url()}`);

    return await context.cookies();
  } finally {
    await browser.close();
  }
};

export class ProxyLoginProvider implements SessionProvider {
  private readonly options: ProxyLoginProviderOptions;
  private readonly store: CookieStore;
  private readonly login: LoginRunner;

  constructor(options: ProxyLoginProviderOptions, login: LoginRunner = runProxyLogin) {
    this.options = options;
    this.store = new CookieStore(options.cookiesPath);
    this.login = login;
  }

  async ensureLoggedIn(): Promise<Credentials> {
    const stored = this.store.load();

    if (stored && stored.cookies.length > 0) {
      const ageMs = Date.now() - stored.obtainedAt;
      if (ageMs < this.options.cookieTtlMs) {
        log.info(
          `Reusing ${stored.cookies.length} stored cookies (${Math.round(ageMs / 60_000)} min old)`,
        );
        return stored;
      }

      log.info('Stored cookies expired, logging in again');
    }

    return this.refreshSession();
  }

  async refreshSession(): Promise<Credentials> {
    const { username, password, loginUrl, redirectUrlPattern } = this.options;
    if (!username || !password) {
      throw new LoginError('Login username or password is not configured');
    }
    if (!loginUrl || !redirectUrlPattern) {
      throw new LoginError('Login URL or redirect pattern is not configured');
    }

    let cookies: StoredCookie[];
    try {
      cookies = await this.login({
        ...this.options,
        username,
        password,
        loginUrl,
        redirectUrlPattern,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LoginError(`Login failed: ${message}`, { cause: error });
    }

    if (cookies.length === 0) {
      throw new LoginError('Login finished without any cookies');
    }

    const credentials: Credentials = { cookies, obtainedAt: Date.now() };
    this.store.save(credentials);
    return credentials;
  }
}

export type { LoginFlowOptions, LoginRunner, ProxyLoginProviderOptions };
