import { resolve } from 'node:path';
import { z } from 'zod';
import { isLogLevel, type LogLevel } from '@workspace/logger';
import { ConfigError } from '../errors.js';

type EnvSource = Record<string, string | undefined>;

const booleanFromEnvSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

function optionalString() {
  return z.preprocess((value) => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed.length ? trimmed : undefined;
    }
    return value;
  }, z.string().optional());
}

function integerFromEnv(name: string, defaultValue: number, min: number) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined || value === '') {
          return defaultValue;
        }

        if (typeof value === 'string') {
          const parsedValue = Number(value);
          return Number.isFinite(parsedValue) ? parsedValue : value;
        }

        return value;
      },
      z
        .number({ invalid_type_error: `Invalid ${name}. Provide an integer.` })
        .int(`Invalid ${name}. Provide an integer.`)
        .min(min, `Invalid ${name}. Provide an integer >= ${min}.`),
    )
    .default(defaultValue);
}

function booleanFromEnv(defaultValue: boolean) {
  return z
    .preprocess((value) => {
      if (value === undefined || value === '') {
        return String(defaultValue);
      }

      if (typeof value === 'string') {
        return value.trim().toLowerCase();
      }

      return value;
    }, booleanFromEnvSchema)
    .default(String(defaultValue));
}

const logLevelSchema = z
  .preprocess(
    (value) =>
      typeof value === 'string' && value.trim()
        ? value.trim().toLowerCase()
        : 'info',
    z.string(),
  )
  .refine((value): value is LogLevel => isLogLevel(value), {
    message: 'Invalid LOG_LEVEL. Use fatal, error, warn, info, debug, trace or silent.',
  });

const envSchema = z.object({
  CRAWLER_DATA_DIR: optionalString(),
  CRAWLER_COOKIES_PATH: optionalString(),
  CRAWLER_CONCURRENCY: integerFromEnv('concurrency', 5, 1),
  CRAWLER_CHUNK_SIZE: integerFromEnv('chunk size', 100, 1),
  CRAWLER_CONTEXTS: integerFromEnv('context count', 1, 1),
  CRAWLER_UNIT_TIMEOUT_MS: integerFromEnv('unit timeout', 10 * 60_000, 1),
  CRAWLER_DOWNLOAD_TIMEOUT_MS: integerFromEnv('download timeout', 60_000, 1),
  CRAWLER_MAX_ATTEMPTS: integerFromEnv('max attempts', 5, 1),
  CRAWLER_RETRY_DELAY_MS: integerFromEnv('retry delay', 1000, 0),
  CRAWLER_REFRESH_COOLDOWN_MS: integerFromEnv('refresh cooldown', 30_000, 0),
  CRAWLER_COOKIE_TTL_MS: integerFromEnv('cookie ttl', 6 * 60 * 60_000, 0),
  CRAWLER_MAX_ERROR_SNAPSHOTS: integerFromEnv('max error snapshots', 500, 0),
  CRAWLER_HEADLESS: booleanFromEnv(true),
  CRAWLER_BROWSER_CHANNEL: optionalString(),
  CRAWLER_BROWSER_EXECUTABLE: optionalString(),
  CRAWLER_USER_AGENT: optionalString(),
  SCOPUS_USERNAME: optionalString(),
  SCOPUS_PASSWORD: optionalString(),
  SCOPUS_BASE_URL: z
    .preprocess(
      (value) =>
        typeof value === 'string' && value.trim()
          ? value.trim()
          : 'https://www.scopus.com/',
      z.string().url('Invalid SCOPUS_BASE_URL. Provide an absolute URL.'),
    )
    .transform((value) => (value.endsWith('/') ? value : `${value}/`)),
  SCOPUS_LOGIN_URL: optionalString(),
  SCOPUS_REDIRECT_PATTERN: optionalString(),
  LOG_LEVEL: logLevelSchema,
});

type CliOverrides = {
  dataDir?: string;
  concurrency?: number;
  chunkSize?: number;
  headless?: boolean;
  logLevel?: LogLevel;
};

type SessionSettings = {
  username: string | undefined;
  password: string | undefined;
  loginUrl: string | undefined;
  redirectUrlPattern: string | undefined;
  cookiesPath: string;
  cookieTtlMs: number;
  refreshCooldownMs: number;
  loginTimeoutMs: number;
  contexts: number;
};

type BrowserSettings = {
  headless: boolean;
  userAgent: string | undefined;
  channel: string | undefined;
  executablePath: string | undefined;
};

type CrawlerConfig = {
  dataDir: string;
  baseUrl: string;
  concurrency: number;
  chunkSize: number;
  unitTimeoutMs: number;
  downloadTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  maxErrorSnapshots: number;
  logLevel: LogLevel;
  session: SessionSettings;
  browser: BrowserSettings;
};

const LOGIN_TIMEOUT_MS = 60_000;

/**
 * Builds the run configuration once from the environment plus CLI
 * overrides. The result is frozen and handed to every component.
 */
export function loadConfig(
  env: EnvSource,
  overrides: CliOverrides = {},
): Readonly<CrawlerConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`${where}: ${issue?.message ?? 'invalid value'}`);
  }

  const values = parsed.data;
  const dataDir = resolve(overrides.dataDir ?? values.CRAWLER_DATA_DIR ?? '.');

  const config: CrawlerConfig = {
    dataDir,
    baseUrl: values.SCOPUS_BASE_URL,
    concurrency: overrides.concurrency ?? values.CRAWLER_CONCURRENCY,
    chunkSize: overrides.chunkSize ?? values.CRAWLER_CHUNK_SIZE,
    unitTimeoutMs: values.CRAWLER_UNIT_TIMEOUT_MS,
    downloadTimeoutMs: values.CRAWLER_DOWNLOAD_TIMEOUT_MS,
    maxAttempts: values.CRAWLER_MAX_ATTEMPTS,
    retryDelayMs: values.CRAWLER_RETRY_DELAY_MS,
    maxErrorSnapshots: values.CRAWLER_MAX_ERROR_SNAPSHOTS,
    logLevel: overrides.logLevel ?? values.LOG_LEVEL,
    session: Object.freeze({
      username: values.SCOPUS_USERNAME,
      password: values.SCOPUS_PASSWORD,
      loginUrl: values.SCOPUS_LOGIN_URL,
      redirectUrlPattern: values.SCOPUS_REDIRECT_PATTERN,
      cookiesPath: resolve(
        dataDir,
        values.CRAWLER_COOKIES_PATH ?? 'cookies.json',
      ),
      cookieTtlMs: values.CRAWLER_COOKIE_TTL_MS,
      refreshCooldownMs: values.CRAWLER_REFRESH_COOLDOWN_MS,
      loginTimeoutMs: LOGIN_TIMEOUT_MS,
      contexts: values.CRAWLER_CONTEXTS,
    }),
    browser: Object.freeze({
      headless: overrides.headless ?? values.CRAWLER_HEADLESS,
      userAgent: values.CRAWLER_USER_AGENT,
      channel: values.CRAWLER_BROWSER_CHANNEL,
      executablePath: values.CRAWLER_BROWSER_EXECUTABLE,
    }),
  };

  return Object.freeze(config);
}

export type {
  BrowserSettings,
  CliOverrides,
  CrawlerConfig,
  EnvSource,
  SessionSettings,
};
