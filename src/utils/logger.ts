import winston from 'winston';
import path from 'path';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

export type LogLevel = keyof typeof levels;

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for errors.log / combined.log; console only when omitted */
  logDir?: string;
  silent?: boolean;
}

// Define format
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  }),
);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levels, value);
}

export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'warn' : 'debug';
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const consoleTransport = new winston.transports.Console();
  const transports = options.logDir
    ? [
        consoleTransport,
        // File transport for error logs
        new winston.transports.File({
          filename: path.join(options.logDir, 'errors.log'),
          level: 'error',
        }),
        // File transport for all logs
        new winston.transports.File({
          filename: path.join(options.logDir, 'combined.log'),
        }),
      ]
    : [consoleTransport];

  return winston.createLogger({
    level: options.level ?? defaultLogLevel(),
    levels,
    format,
    transports,
    silent: options.silent ?? process.env.NODE_ENV === 'test',
  });
}

const logger = createLogger({ logDir: process.env.LOG_DIR });

export default logger;
