/**
 * Console-backed logger with a namespace prefix and a level gate.
 *
 * The threshold comes from TESSPIPE_LOG_LEVEL (debug | info | warn | error |
 * silent) and is read on every call so tests and long-lived processes can
 * change it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Namespace = 'Process' | 'Parser' | 'Tesseract' | 'Config' | 'CLI';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function currentLogLevel(): LogLevel {
  const raw = process.env.TESSPIPE_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLogLevel()];
}

export function createLogger(namespace: Namespace): Logger {
  const prefix = `[tesspipe:${namespace}]`;
  return {
    debug: (msg: string) => {
      if (enabled('debug')) console.debug(`${prefix} ${msg}`);
    },
    info: (msg: string) => {
      if (enabled('info')) console.info(`${prefix} ${msg}`);
    },
    warn: (msg: string) => {
      if (enabled('warn')) console.warn(`${prefix} ${msg}`);
    },
    error: (msg: string, err?: unknown) => {
      if (!enabled('error')) return;
      if (err) console.error(`${prefix} ${msg}`, err);
      else console.error(`${prefix} ${msg}`);
    },
  };
}
