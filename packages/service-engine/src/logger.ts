import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  level?: string;
  name?: string;
  /** Defaults to stdout. CLIs pass stderr so log lines stay out of command output. */
  destination?: DestinationStream;
}

export const createLoggerOptions = (level: string, name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const loggerOptions = createLoggerOptions(options.level ?? 'info', options.name);
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
};

export const silentLogger: Logger = pino({ level: 'silent' });
