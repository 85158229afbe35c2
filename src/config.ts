import dotenv from 'dotenv';
import { z } from 'zod';
import type { HashingCost } from './domain/auth/credentialHasher.js';

dotenv.config();

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().optional(),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),

  // argon2id cost: iterations and memory in KiB
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-directory'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export interface TokenSettings {
  readonly secret: string;
  readonly algorithm: JwtAlgorithm;
  readonly accessTokenTtlMinutes: number;
}

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly databaseUrl: string | undefined;
  readonly token: TokenSettings;
  readonly hashing: HashingCost;
  readonly logLevel: string;
  readonly serviceName: string;
}

/**
 * Parse and validate the process environment once, at startup.
 * The result is frozen and handed to constructors; nothing below this
 * layer reads process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    token: Object.freeze({
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      accessTokenTtlMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    }),
    hashing: Object.freeze({
      timeCost: parsed.ARGON2_TIME_COST,
      memoryCost: parsed.ARGON2_MEMORY_COST,
    }),
    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  });
}

/**
 * Database URL alone, for scripts (migrations) that do not need the rest.
 */
export function loadDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  return z.string().min(1, 'DATABASE_URL environment variable is required').parse(env.DATABASE_URL);
}
