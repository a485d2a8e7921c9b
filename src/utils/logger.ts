import winston from 'winston';
import path from 'path';
import { env } from '../config/env';

/**
 * Structured logging.
 *
 * Console output is always on; file output (logs/error.log and
 * logs/combined.log) is enabled with LOG_TO_FILE=true.
 * Under NODE_ENV=test the default level is `error` so suites stay quiet.
 */

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const consoleFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}] ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

function defaultLevel(): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'production') return 'info';
  if (env.NODE_ENV === 'test') return 'error';
  return 'debug';
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      consoleFormat
    ),
  }),
];

if (env.LOG_TO_FILE) {
  transports.push(
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: defaultLevel(),
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    json()
  ),
  transports,
  exitOnError: false,
});

type LogMeta = Record<string, unknown>;

export const Logger = {
  debug(message: string, meta?: LogMeta) {
    logger.debug(message, meta);
  },

  info(message: string, meta?: LogMeta) {
    logger.info(message, meta);
  },

  warn(message: string, meta?: LogMeta) {
    logger.warn(message, meta);
  },

  /**
   * Errors are flattened to message + stack so they survive JSON output.
   */
  error(message: string, error?: Error | LogMeta) {
    if (error instanceof Error) {
      logger.error(message, {
        error: error.message,
        stack: error.stack,
      });
    } else {
      logger.error(message, error);
    }
  },

  /**
   * Agent-scoped line, prefixed with the agent type.
   */
  agent(agentType: string, message: string, meta?: LogMeta) {
    logger.info(`[${agentType}] ${message}`, meta);
  },

  /**
   * Audit events (authentication, authorization, processing outcome).
   */
  audit(action: string, message: string, meta?: LogMeta) {
    logger.info(`[Audit ${action}] ${message}`, meta);
  },

  api(endpoint: string, message: string, meta?: LogMeta) {
    logger.info(`[API ${endpoint}] ${message}`, meta);
  },
};

