/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig(env) takes an explicit env object so tests don't touch process.env.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; env flags are spelled out instead.
const EnvFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('conference-backend'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: EnvFlagSchema,
  SEED_ORGANIZER_EMAIL: z.string().email().default('organizer@example.com'),
  SEED_ORGANIZER_PASSWORD: z.string().min(8).default('change-me-please'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  databaseUrl: string;

  db: {
    poolMax: number;
    connectionTimeoutMs: number;
  };

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  seed: {
    enabled: boolean;
    organizerEmail: string;
    organizerPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    databaseUrl: parsed.DATABASE_URL,

    db: {
      poolMax: parsed.DB_POOL_MAX,
      connectionTimeoutMs: parsed.DB_CONNECTION_TIMEOUT_MS,
    },

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    seed: {
      enabled: parsed.SEED_ON_START,
      organizerEmail: parsed.SEED_ORGANIZER_EMAIL,
      organizerPassword: parsed.SEED_ORGANIZER_PASSWORD,
    },
  };
}
