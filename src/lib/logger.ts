import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

// Diagnostics go to stderr so stdout stays free for the run summary.
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const pretty = options.pretty ?? (isDev && process.stderr.isTTY === true);

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          singleLine: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}
