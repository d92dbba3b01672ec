/**
 * Console logger and no-op metrics used when the embedder injects none.
 *
 * Level threshold comes from CHAT_DIGEST_LOG_LEVEL (debug | info | warn | error),
 * read when the logger is created.
 */

import type { Logger, Metrics } from '../types/index.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Create a console logger tagged with a module name:
 * `[INFO] [provider-gateway] Calling provider {"attempt":1}`
 */
export function createConsoleLogger(
  module: string,
  level: LogLevel = resolveLogLevel(process.env['CHAT_DIGEST_LOG_LEVEL'])
): Logger {
  const threshold = LEVEL_ORDER[level];
  const format = (tag: string, msg: string, meta?: Record<string, unknown>): string =>
    `[${tag}] [${module}] ${msg}${meta ? ` ${JSON.stringify(meta)}` : ''}`;

  return {
    debug: (msg, meta) => {
      if (threshold <= LEVEL_ORDER.debug) console.debug(format('DEBUG', msg, meta));
    },
    info: (msg, meta) => {
      if (threshold <= LEVEL_ORDER.info) console.log(format('INFO', msg, meta));
    },
    warn: (msg, meta) => {
      if (threshold <= LEVEL_ORDER.warn) console.warn(format('WARN', msg, meta));
    },
    error: (msg, meta) => {
      if (threshold <= LEVEL_ORDER.error) console.error(format('ERROR', msg, meta));
    },
  };
}

export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Describe an unknown thrown value for log metadata
 */
export function describeError(error: unknown): { errorClass: string; message: string } {
  if (error instanceof Error) {
    return { errorClass: error.name, message: error.message };
  }
  return { errorClass: typeof error, message: String(error) };
}
