import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: string;
  serviceName: string;
  nodeEnv: string;
  silent?: boolean;
}

/**
 * Structured JSON logger. Pass errors as `{ err }` metadata so the
 * stack survives serialization.
 */
export function createLogger(options: LoggerOptions): Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: {
      service: options.serviceName,
      env: options.nodeEnv,
    },
    transports: [new winston.transports.Console()],
  });
}

// Shared instance for scripts and for components constructed without one.
export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  serviceName: process.env.SERVICE_NAME ?? 'user-directory',
  nodeEnv: process.env.NODE_ENV ?? 'development',
  silent: process.env.NODE_ENV === 'test',
});
