import { createLogger, format, transports } from 'winston';
import { env } from '../config/env';

// Custom levels so morgan access lines get their own `http` level
const customLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogMeta = Record<string, unknown>;

const readableFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${timestamp}] ${level.toUpperCase()}: ${message}${extra}`;
});

const baseLogger = createLogger({
  levels: customLevels,
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    env.NODE_ENV === 'production' ? format.json() : readableFormat
  ),
  transports: [new transports.Console()],
});

function describeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}

export const logger = {
  debug(message: string, meta: LogMeta = {}): void {
    baseLogger.log('debug', message, meta);
  },
  info(message: string, meta: LogMeta = {}): void {
    baseLogger.log('info', message, meta);
  },
  warn(message: string, meta: LogMeta = {}): void {
    baseLogger.log('warn', message, meta);
  },
  /** Access-log lines from morgan. */
  http(message: string): void {
    baseLogger.log('http', message);
  },
  error(message: string, error?: unknown, meta: LogMeta = {}): void {
    const details = error === undefined ? {} : describeError(error);
    baseLogger.log('error', message, { ...meta, ...details });
  },
};
