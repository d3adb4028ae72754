import 'dotenv/config';
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pick the log level: explicit LOG_LEVEL wins, otherwise silent under test,
 * info in production and debug everywhere else.
 */
function resolveLogLevel(nodeEnv: string): LevelWithSilent {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';

  return pino({
    level: resolveLogLevel(nodeEnv),
    base: {
      env: nodeEnv,
      service: 'gwl-timeslice',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
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
 * Create a child logger with additional context (e.g. `{ component: 'GwlResolver' }`)
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
