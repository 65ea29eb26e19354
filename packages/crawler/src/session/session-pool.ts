import type {
  Credentials,
  ExecutionContext,
  ExecutionContextFactory,
  SessionProvider,
} from '@workspace/browser-session';
import { createLogger } from '@workspace/logger';
import { SessionBootstrapError, errorMessage } from '../errors.js';
import { Session } from './session.js';
import type { SessionInfo, SessionPoolConfig, SessionPoolStats } from './types.js';
import { DEFAULT_SESSION_POOL_CONFIG } from './types.js';

const log = createLogger('SessionPool');

/**
 * Shared execution contexts plus the credentials they run under.
 *
 * Refresh is single-flight: concurrent callers share one in-flight refresh,
 * and a refresh attempted less than `refreshCooldownMs` after the previous
 * one is a no-op that hands back the current credentials.
 */
export class SessionPool<C extends ExecutionContext> {
  private readonly sessions: Session<C>[];
  private readonly config: SessionPoolConfig;
  private readonly provider: SessionProvider;
  private readonly factory: ExecutionContextFactory<C>;
  private credentials: Credentials | undefined;
  private refreshInFlight: Promise<Credentials> | undefined;
  private lastRefreshAt: number | undefined;
  private refreshCount: number;
  private cursor: number;
  private closed: boolean;

  constructor(
    provider: SessionProvider,
    factory: ExecutionContextFactory<C>,
    config?: Partial<SessionPoolConfig>,
  ) {
    this.provider = provider;
    this.factory = factory;
    this.config = { ...DEFAULT_SESSION_POOL_CONFIG, ...config };
    this.sessions = [];
    this.refreshCount = 0;
    this.cursor = 0;
    this.closed = false;
  }

  async start(): Promise<void> {
    if (this.sessions.length > 0) {
      return;
    }

    let credentials: Credentials;
    try {
      credentials = await this.provider.ensureLoggedIn();
    } catch (error) {
      throw new SessionBootstrapError(`Login failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      for (let index = 0; index < this.config.contexts; index++) {
        this.sessions.push(new Session(await this.factory.create(credentials)));
      }
    } catch (error) {
      await this.close();
      throw new SessionBootstrapError(
        `Could not create execution context: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.credentials = credentials;
    this.closed = false;
    log.info(`Started ${this.sessions.length} execution context(s)`);
  }

  /**
   * Picks the session with the fewest in-flight leases, rotating on ties.
   */
  acquire(): Session<C> {
    if (this.sessions.length === 0) {
      throw new Error('Session pool is not started');
    }

    let selected: Session<C> | undefined;
    for (let offset = 0; offset < this.sessions.length; offset++) {
      const candidate = this.sessions[(this.cursor + offset) % this.sessions.length];
      if (
        candidate &&
        (selected === undefined || candidate.activeLeases < selected.activeLeases)
      ) {
        selected = candidate;
      }
    }

    if (!selected) {
      throw new Error('Session pool is not started');
    }

    this.cursor = (this.cursor + 1) % this.sessions.length;
    selected.lease();
    return selected;
  }

  release(session: Session<C>): void {
    session.release();
  }

  refresh(): Promise<Credentials> {
    if (this.refreshInFlight) {
      log.debug('Refresh already in flight, waiting for it');
      return this.refreshInFlight;
    }

    if (
      this.credentials &&
      this.lastRefreshAt !== undefined &&
      Date.now() - this.lastRefreshAt < this.config.refreshCooldownMs
    ) {
      log.debug('Refresh skipped, still within cooldown');
      return Promise.resolve(this.credentials);
    }

    const pending = this.performRefresh().finally(() => {
      this.refreshInFlight = undefined;
    });
    this.refreshInFlight = pending;
    return pending;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const contexts = this.sessions.map((session) => session.context);
    this.sessions.length = 0;

    const results = await Promise.allSettled(
      contexts.map((context) => context.close()),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Error closing execution context:', errorMessage(result.reason));
      }
    }

    try {
      await this.factory.close();
    } catch (error) {
      log.warn('Error closing context factory:', errorMessage(error));
    }
  }

  getStats(): SessionPoolStats {
    return {
      total: this.sessions.length,
      inFlight: this.sessions.reduce((sum, session) => sum + session.activeLeases, 0),
      refreshCount: this.refreshCount,
      lastRefreshAt: this.lastRefreshAt,
    };
  }

  getSessions(): readonly SessionInfo[] {
    return this.sessions.map((session) => session.info);
  }

  private async performRefresh(): Promise<Credentials> {
    log.info('Refreshing session credentials...');

    try {
      const credentials = await this.provider.refreshSession();
      await Promise.all(
        this.sessions.map((session) => session.context.applyCredentials(credentials)),
      );

      this.credentials = credentials;
      this.refreshCount += 1;
      log.info(`Session refreshed (${credentials.cookies.length} cookies)`);
      return credentials;
    } finally {
      // Failed attempts also start the cooldown so a broken login is not hammered.
      this.lastRefreshAt = Date.now();
    }
  }
}
