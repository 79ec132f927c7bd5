/**
 * Centralized Winston logger for the voice sort assistant
 */

import winston from 'winston';
import path from 'node:path';

type Env = Record<string, string | undefined>;

export const logger = winston.createLogger({
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  },
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [
    // Console transport with colorized output
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          let msg = `[${String(timestamp)}] ${level}: ${String(message)}`;
          if (Object.keys(meta).length > 0) {
            msg += ` ${JSON.stringify(meta)}`;
          }
          return msg;
        }),
      ),
    }),
  ],
});

let fileTransport: winston.transports.FileTransportInstance | null = null;

/**
 * Apply LOG_LEVEL and LOG_FILE. Runs after `.env` is loaded, since this
 * module is evaluated before the entry point gets to load it.
 * An empty LOG_FILE disables the file transport.
 */
export function configureLogger(env: Env = process.env): void {
  logger.level = env.LOG_LEVEL || 'info';

  if (fileTransport) {
    logger.remove(fileTransport);
    fileTransport.close?.();
    fileTransport = null;
  }

  const logFile = env.LOG_FILE ?? path.join('logs', 'app.log');
  if (logFile) {
    // File transport with JSON format
    fileTransport = new winston.transports.File({
      filename: path.resolve(process.cwd(), logFile),
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    });
    logger.add(fileTransport);
  }
}

/**
 * Render an unknown thrown value for a log line
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
