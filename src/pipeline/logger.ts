import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON lines with an ISO `time` and a textual `level`, which CloudWatch Logs
 * Insights can filter on directly.
 */
export function createLogger(
  level: LogLevel = 'info',
  base: Record<string, unknown> = {},
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    level,
    base,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export function loggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  const raw = (env.LOG_LEVEL ?? 'info').toLowerCase();
  return createLogger(isLogLevel(raw) ? raw : 'info');
}
