export {
  PlaywrightContextFactory,
  PlaywrightExecutionContext,
  DEFAULT_USER_AGENT,
  type PlaywrightContextOptions,
} from './internals/playwright-context.js';
export { PlaywrightPageInteraction } from './internals/page-interaction.js';
export {
  ProxyLoginProvider,
  type LoginFlowOptions,
  type LoginRunner,
  type ProxyLoginProviderOptions,
} from './internals/proxy-login-provider.js';
export { CookieStore } from './internals/cookie-store.js';
export {
  AuthRejectedError,
  LoginError,
  isAuthRejectionStatus,
} from './internals/errors.js';
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
} from './internals/types.js';
