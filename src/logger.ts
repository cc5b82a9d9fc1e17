import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Syslog-like severities; `critical` is reserved for fatal startup problems
const levels = {
  critical: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

winston.addColors({
  critical: 'magenta',
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
});

// Custom log format
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  // Add metadata if present
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

// Create logger instance
export const logger = winston.createLogger({
  levels,
  level: config.logging.level,
  silent: config.logging.silent,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    // Console output with colors
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
    // File output for all logs, unless disabled with an empty LOG_FILE
    ...(config.logging.file
      ? [
          new winston.transports.File({
            filename: config.logging.file,
            maxsize: 5242880, // 5MB
            maxFiles: 5,
          }),
        ]
      : []),
  ],
});

// Mask sensitive data in logs
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}

/**
 * End the logger and wait until its transports have written everything.
 * Call before process.exit so the last lines are not lost.
 */
export function flushLogger(target: winston.Logger = logger): Promise<void> {
  return new Promise((resolve) => {
    target.on('finish', () => resolve());
    target.end();
  });
}
