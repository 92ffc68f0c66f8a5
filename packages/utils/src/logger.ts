import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  service?: string;
  requestId?: string;
  sessionId?: string;
  topic?: string;
  field?: string;
}

const nodeEnv = process.env['NODE_ENV'] ?? 'development';
const usePrettyOutput = nodeEnv === 'development';

// Logs go to stderr so that answers printed on stdout stay machine-readable.
const STDERR = 2;

const loggerOptions: pino.LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? (nodeEnv === 'test' ? 'silent' : 'info'),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: process.env['SERVICE_NAME'] ?? 'infobox-query',
    version: process.env['APP_VERSION'] ?? '1.0.0',
  },
};

if (usePrettyOutput) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: STDERR,
    },
  };
}

const baseLogger = usePrettyOutput ? pino(loggerOptions) : pino(loggerOptions, pino.destination(STDERR));

export type Logger = PinoLogger;

export const logger: Logger = baseLogger;

export function createLogger(context: LogContext): Logger {
  return baseLogger.child(context);
}

// Utility to create a logger with request context
export function createRequestLogger(requestId: string, context?: Partial<LogContext>): Logger {
  return createLogger({
    requestId,
    ...context,
  });
}
