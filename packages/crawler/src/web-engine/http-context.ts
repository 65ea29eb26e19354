import { randomUUID } from 'node:crypto';
import http from 'node:http';
import https from 'node:https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
  DEFAULT_USER_AGENT,
  type Credentials,
  type ExecutionContext,
  type ExecutionContextFactory,
  type StoredCookie,
} from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';

const log = createLogger('HttpContext');

type HttpContextOptions = {
  userAgent: string;
  timeoutMs: number;
  /** Replaces the network transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
};

type HttpResponse = {
  status: number;
  data: unknown;
};

const DEFAULT_HTTP_OPTIONS: HttpContextOptions = {
  userAgent: DEFAULT_USER_AGENT,
  timeoutMs: 10_000,
};

function cookieMatchesHost(cookie: StoredCookie, hostname: string): boolean {
  const domain = cookie.domain.startsWith('.')
    ? cookie.domain.slice(1)
    : cookie.domain;
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

/**
 * Builds the `Cookie` header for a request to `url` from the session cookies.
 */
export function cookieHeaderFor(
  credentials: Credentials,
  url: string,
): string | undefined {
  const { hostname, pathname, protocol } = new URL(url);
  const pairs = credentials.cookies
    .filter(
      (cookie) =>
        cookieMatchesHost(cookie, hostname) &&
        pathname.startsWith(cookie.path || '/') &&
        (!cookie.secure || protocol === 'https:'),
    )
    .map((cookie) => `${cookie.name}=${cookie.value}`);

  return pairs.length ? pairs.join('; ') : undefined;
}

/**
 * Cookie-authenticated JSON client. 4xx responses come back as values;
 * 429 and 5xx are raised by axios so they classify as network errors.
 */
export class HttpExecutionContext implements ExecutionContext {
  readonly id: string;
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private credentials: Credentials;

  constructor(credentials: Credentials, options: HttpContextOptions) {
    this.id = randomUUID();
    this.credentials = credentials;

    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets: 5,
      maxFreeSockets: 2,
      timeout: options.timeoutMs,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      timeout: options.timeoutMs,
      maxRedirects: 5,
      validateStatus: (status) => status < 500 && status !== 429,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'application/json, text/plain, */*',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async applyCredentials(credentials: Credentials): Promise<void> {
    this.credentials = credentials;
  }

  async getJson(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    const cookie = cookieHeaderFor(this.credentials, url);
    const response = await this.client.get<unknown>(url, {
      headers: cookie ? { Cookie: cookie } : {},
      responseType: 'json',
      signal,
    });

    return { status: response.status, data: response.data };
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export class HttpContextFactory
  implements ExecutionContextFactory<HttpExecutionContext>
{
  private readonly options: HttpContextOptions;

  constructor(options?: Partial<HttpContextOptions>) {
    this.options = { ...DEFAULT_HTTP_OPTIONS, ...options };
  }

  async create(credentials: Credentials): Promise<HttpExecutionContext> {
    const context = new HttpExecutionContext(credentials, this.options);
    log.debug(`Created HTTP context ${context.id}`);
    return context;
  }

  async close(): Promise<void> {
    // Each context owns and destroys its own agents.
  }
}

export type { HttpContextOptions, HttpResponse };
