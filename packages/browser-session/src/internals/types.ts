type SameSite = 'Strict' | 'Lax' | 'None';

type StoredCookie = {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: SameSite;
};

type Credentials = {
  cookies: StoredCookie[];
  obtainedAt: number;
};

/**
 * Obtains credentials for the remote side. `refreshSession` always performs
 * a fresh login; cooldown and single-flight are the caller's concern.
 */
interface SessionProvider {
  ensureLoggedIn(): Promise<Credentials>;
  refreshSession(): Promise<Credentials>;
}

/**
 * Shared, expensive resource multiplexed across concurrent workers.
 */
interface ExecutionContext {
  readonly id: string;
  applyCredentials(credentials: Credentials): Promise<void>;
  close(): Promise<void>;
}

type DownloadOptions = {
  savePath: string;
  timeoutMs: number;
};

/**
 * One page/tab inside a browser context. Every wait is bounded.
 */
interface PageInteraction {
  /** Navigates and returns the main response status, if any. */
  goto(url: string, timeoutMs?: number): Promise<number | undefined>;
  click(selector: string, timeoutMs?: number): Promise<void>;
  dispatchClick(selector: string, timeoutMs?: number): Promise<void>;
  check(selector: string, timeoutMs?: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  textContent(selector: string, timeoutMs: number): Promise<string | undefined>;
  /** Clicks `selector` and saves the download it triggers; false on timeout. */
  downloadOnClick(selector: string, options: DownloadOptions): Promise<boolean>;
  close(): Promise<void>;
}

interface BrowserExecutionContext extends ExecutionContext {
  newPage(): Promise<PageInteraction>;
}

interface ExecutionContextFactory<C extends ExecutionContext> {
  create(credentials: Credentials): Promise<C>;
  close(): Promise<void>;
}

export type {
  BrowserExecutionContext,
  Credentials,
  DownloadOptions,
  ExecutionContext,
  ExecutionContextFactory,
  PageInteraction,
  SameSite,
  SessionProvider,
  StoredCookie,
};
