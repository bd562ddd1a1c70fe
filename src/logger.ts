import pino, { type Logger, type LoggerOptions } from 'pino';

export interface CreateLoggerOptions {
  pretty?: boolean;
}

export function createLogger(level: string, options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level,
    base: undefined
  };

  // Test runners own stdout for their reporters; keep logs on stderr.
  const stderrDestination = pino.destination({ fd: 2, sync: false });

  if (options.pretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(loggerOptions, stderrDestination);
}
