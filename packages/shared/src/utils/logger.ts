import pino from 'pino';
import type { LoggingConfig } from '../schemas/config.schema.js';

export type Logger = pino.Logger;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Log file path. Written synchronously, parent directories are created. Disables `pretty`. */
  destination?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { name = 'vantage', level = 'info', pretty = false, destination } = options;

  const base: pino.LoggerOptions = {
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (destination) {
    return pino(base, pino.destination({ dest: destination, sync: true, mkdir: true }));
  }

  if (pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
      },
    });
  }

  return pino(base);
}

/** Builds the monitor's logger from the `logging` section of a resolved config. */
export function createLoggerFromConfig(logging: LoggingConfig, name?: string): Logger {
  return createLogger({
    name,
    level: logging.level,
    pretty: logging.pretty,
    destination: logging.destination,
  });
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ pretty: process.env.NODE_ENV !== 'production' });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}
