import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for run context (pipeline run ID, target language, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';
  const logLevel = process.env.LOG_LEVEL || defaultLevel;

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'meditranslate',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Child loggers are created at import time, so the run context is read per line
    mixin: () => getRunContext(),
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}

/**
 * Run a unit of work with the given context attached to every log line written inside it
 */
export function withRunContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return runContext.run({ ...getRunContext(), ...context }, fn);
}
