import pino, { type Logger, type LoggerOptions } from 'pino';
import type { RuntimeConfig } from './config.js';

export type { Logger };

// Logs go to stderr so stdout stays free for streamed model output.
export function createLogger(
  config: Pick<RuntimeConfig, 'logLevel' | 'nodeEnv'>,
  turnId?: string
): Logger {
  const options: LoggerOptions = {
    name: 'relayloop',
    level: config.logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const baseLogger =
    config.nodeEnv === 'development'
      ? pino({
          ...options,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        })
      : pino(options, pino.destination(2));

  if (turnId) {
    return baseLogger.child({ turnId });
  }

  return baseLogger;
}

/**
 * Logger used by library classes when the caller does not pass one.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
