/**
 * The logging surface the core needs. The winston logger built in
 * infra/logger.ts satisfies it.
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
