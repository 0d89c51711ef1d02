import { localTimestamp } from './index.js';

/**
 * Shared logger for the background tasks, caches and report code that
 * don't have access to the Fastify app instance.
 *
 * Respects the LOG_LEVEL environment variable:
 *   debug < info < warn < error
 *
 * Default: 'info' ('warn' when NODE_ENV=production).
 * Every line is prefixed with the local timestamp and, for child
 * loggers, a bracketed component tag: `[2024-05-01 02:00:00] [report] …`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function initialLevel(): number {
  const isProd = process.env.NODE_ENV === 'production';
  const configured = (process.env.LOG_LEVEL || (isProd ? 'warn' : 'info')).toLowerCase();
  return isLogLevel(configured) ? LEVELS[configured] : LEVELS.info;
}

let minLevel = initialLevel();

/** Override the level at runtime (tests silence output with 'error'). */
export function setLogLevel(level: LogLevel): void {
  minLevel = LEVELS[level];
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(tag: string): Logger;
}

function createLogger(tags: string[]): Logger {
  const prefix = () => {
    const head = `[${localTimestamp()}]`;
    return tags.length > 0 ? `${head} ${tags.map((t) => `[${t}]`).join(' ')}` : head;
  };
  return {
    debug: (...args) => { if (minLevel <= 0) console.log(prefix(), ...args); },
    info:  (...args) => { if (minLevel <= 1) console.log(prefix(), ...args); },
    warn:  (...args) => { if (minLevel <= 2) console.warn(prefix(), ...args); },
    error: (...args) => { if (minLevel <= 3) console.error(prefix(), ...args); },
    child: (tag) => createLogger([...tags, tag]),
  };
}

export const logger: Logger = createLogger([]);
