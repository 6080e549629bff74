/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Component logs should carry the same base fields (component, statement...)
 *   without every call site repeating them.
 *
 * HOW TO USE:
 * - const log = withContext({ component: 'user-record-store' })
 * - log.error('user_store.statement_failed', { statement: 'GET_USER_BY_ID', userId, err })
 */

import type { Logger } from './logger';
import { logger as rootLogger } from './logger';

export type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withContext(base: LogMeta, logger: Logger = rootLogger): ContextLogger {
  return {
    info: (msg, meta = {}) => void logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => void logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => void logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => void logger.debug(msg, { ...base, ...meta }),
  };
}
