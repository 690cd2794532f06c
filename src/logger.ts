/**
 * Minimal leveled logger writing to stderr, so it never mixes with
 * output a CLI prints on stdout.
 *
 * The default level comes from the LOG_LEVEL environment variable
 * (debug, info, warn, error, silent) and falls back to `warn`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  error(message: string, meta?: LogContext): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Anything with a `write(string)`, e.g. process.stderr. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogStream;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Read the level from LOG_LEVEL, ignoring unknown values.
 */
export function levelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'warn',
): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : fallback;
}

function formatMeta(meta: LogContext | undefined): string {
  if (!meta) return '';
  const parts = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

/**
 * Create a logger that writes `[level] message key=value` lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? levelFromEnv()];
  const stream = options.stream ?? process.stderr;

  const log = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogContext): void => {
    if (LOG_LEVELS[level] < threshold) return;
    stream.write(`[${level}] ${message}${formatMeta(meta)}\n`);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const defaultLogger: Logger = createLogger();
