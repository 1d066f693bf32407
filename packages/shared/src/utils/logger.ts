import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path or file descriptor. Defaults to stderr so stdout stays free for metric lines. */
  destination?: string | number;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'resmon', level = 'info', pretty = false, destination = 2 } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination,
        },
      }
    : undefined;

  return pino(
    {
      name,
      level,
      transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    transport ? undefined : pino.destination(destination),
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'].includes(value);
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    const envLevel = process.env.RESMON_LOG_LEVEL ?? '';
    defaultLogger = createLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: process.env.NODE_ENV !== 'production',
    });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
