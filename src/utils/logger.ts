import winston from 'winston';
import path from 'path';

const DEFAULT_LOG_LEVEL = 'info';

// Read here rather than through config, which logs through this module
export const resolveLogLevel = (value: string | undefined): string =>
  value && Object.keys(winston.config.npm.levels).includes(value)
    ? value
    : DEFAULT_LOG_LEVEL;

const logLevel = resolveLogLevel(process.env.LOG_LEVEL);
const logFilePath = path.resolve(process.env.LOG_FILE_PATH || 'logs/posts-api.log');
const errorLogPath = path.join(path.dirname(logFilePath), 'error.log');
const isProduction = process.env.NODE_ENV === 'production';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const serviceLabel = service ? `[${String(service)}]` : '';
    const metaString = Object.keys(meta).length
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${String(timestamp)} ${level} ${serviceLabel} ${String(message)}${metaString}`;
  }),
);

const logger = winston.createLogger({
  level: logLevel,
  format: logFormat,
  defaultMeta: { service: 'posts-api' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
    }),
  ],
});

// Add file transports in production
if (isProduction) {
  logger.add(
    new winston.transports.File({
      filename: logFilePath,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }),
  );

  logger.add(
    new winston.transports.File({
      filename: errorLogPath,
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
      tailable: true,
    }),
  );
}

export type Logger = winston.Logger;

/**
 * Child logger tagged with the component name, e.g. `createLogger('PostDAO')`.
 */
export const createLogger = (service?: string): Logger => {
  return logger.child({ service });
};

export default logger;
