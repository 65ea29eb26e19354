import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Run aborted (session bootstrap failed)
 * - error (50): Unit failures, ledger write errors
 * - warn (40): Auth rejections, skipped input rows
 * - info (30): Unit transitions, chunk progress (default)
 * - debug (20): Attempt-level details
 * - trace (10): Everything else
 */

type LogLevel = pino.LevelWithSilent

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value)
}

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? ''
  return isLogLevel(normalized) ? normalized : 'info'
}

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  transport:
    process.env.LOG_FORMAT === 'json'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname,context',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
})

// Children keep the level they were created with, so they are tracked here.
const trackedLoggers: pino.Logger[] = [baseLogger]

function track(logger: pino.Logger): pino.Logger {
  trackedLoggers.push(logger)
  return logger
}

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }

  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg)
  }

  return String(arg)
}

/**
 * Joins the message and trailing arguments into one line so that call sites
 * can pass errors and plain objects without building strings themselves.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: Exclude<LogLevel, 'silent'>): LogMethod => {
    return (msgOrObj, ...args) => {
      const message = [msgOrObj, ...args].map(formatArg).join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => createLoggerWrapper(track(logger.child(bindings)))
  }
}

/**
 * Root logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Discovered units', { total: 120 });
 * log.error('Unit failed:', error);
 * ```
 *
 * Level comes from `LOG_LEVEL` (default `info`); `LOG_FORMAT=json` switches
 * off the pretty transport.
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Child logger whose lines are prefixed with `[context]`.
 *
 * @example
 * ```typescript
 * const ledgerLog = createLogger('StatusLedger');
 * ledgerLog.info('Wrote status.csv');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(track(baseLogger.child({ context })))
}

export function setLogLevel(level: LogLevel) {
  for (const logger of trackedLoggers) {
    logger.level = level
  }
}

export { isLogLevel, resolveLevel }
export type { Logger, LogLevel }
