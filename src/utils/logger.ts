import pino from 'pino';
import type { Logger } from 'pino';

const LOG_LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLogLevel(): pino.LevelWithSilent {
  const env = process.env.NODE_ENV || 'development';
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  if (env === 'test') {
    return 'silent';
  }
  return env === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const env = process.env.NODE_ENV || 'development';
  const usePretty = env === 'development' && process.env.LOG_PRETTY !== 'false';

  return pino({
    level: resolveLogLevel(),
    base: {
      env,
      service: 'sar-ingest',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(usePretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env,service',
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
