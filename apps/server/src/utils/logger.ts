/**
 * Logger utility for services.
 *
 * All modules log through one pino root (the same logger Fastify uses), each
 * through a child bound to its namespace so lines can be filtered by module.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // Keep test output readable
  return process.env.VITEST ? 'silent' : 'info';
}

const children = new Set<PinoLogger>();

export const rootLogger: PinoLogger = pino({
  level: defaultLevel(),
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

/**
 * Create a logger instance with optional namespace prefix.
 *
 * @example
 * const log = createLogger('Poller');
 * log.warn('Fetch failed', { consecutiveFailures: 2 });
 * // => {"module":"Poller","consecutiveFailures":2,"msg":"[Poller] Fetch failed"}
 */
export function createLogger(namespace?: string): Logger {
  const prefix = namespace ? `[${namespace}] ` : '';
  const child = namespace ? rootLogger.child({ module: namespace }) : rootLogger;
  children.add(child);

  return {
    debug: (message, context) => child.debug(context ?? {}, prefix + message),
    info: (message, context) => child.info(context ?? {}, prefix + message),
    warn: (message, context) => child.warn(context ?? {}, prefix + message),
    error: (message, context) => child.error(context ?? {}, prefix + message),
  };
}

/**
 * Change the level of every logger at runtime (SIGHUP reload)
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
  // pino children keep the level they were created with
  for (const child of children) child.level = level;
}
