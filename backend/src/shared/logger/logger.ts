/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Structured JSON logs with stable metadata (service, env) for log querying.
 * - The composition root builds the app logger from validated config;
 *   `logger` is the env-driven instance for scripts and code that runs
 *   before config exists.
 *
 * HOW TO USE:
 * - Inside the app, take `deps.logger` (or a `withContext(...)` over it).
 * - Log errors as `{ err }`, not as a bare Error, so the stack survives.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export type LoggerOptions = {
  level: string;
  service: string;
  env: string;
};

export function createAppLogger(opts: LoggerOptions): Logger {
  return winston.createLogger({
    level: opts.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    transports: [new winston.transports.Console()],
  });
}

export const logger: Logger = createAppLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'conference-backend',
  env: process.env.NODE_ENV ?? 'development',
});
