/**
 * Logger interface for observability
 *
 * Every component receives a Logger at construction time and logs through a
 * child carrying its own context. The default implementation is winston:
 *
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const runner = new JobRunner(ledger, executor, options, logger.child({ component: 'job-runner' }));
 * ```
 */

import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'simple';
  /** Also append every entry to this file when set */
  logFile?: string;
}

/**
 * Resolve logger configuration
 *
 * Priority for the level:
 * 1. Explicit level (from the batch configuration)
 * 2. LOG_LEVEL environment variable
 * 3. Default: 'info'
 *
 * LOG_FORMAT selects json or simple (default: simple). Under NODE_ENV=test
 * only errors are logged.
 */
export function getLoggerConfig(
  options: { level?: LogLevel; logFile?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): LoggerConfig {
  if (env.NODE_ENV === 'test') {
    return { level: 'error', format: 'simple' };
  }

  const envLevel = env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const format = env.LOG_FORMAT === 'json' ? 'json' : 'simple';

  return { level, format, logFile: options.logFile };
}

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ level: config.level }),
  ];

  if (config.logFile) {
    transports.push(new winston.transports.File({ filename: config.logFile, level: config.level }));
  }

  return transports;
}

/**
 * Create the process logger
 */
export function createLogger(options: { level?: LogLevel; logFile?: string } = {}): Logger {
  const config = getLoggerConfig(options);

  return winston.createLogger({
    level: config.level,
    format: createFormat(config),
    transports: createTransports(config),
    exitOnError: false,
  });
}
