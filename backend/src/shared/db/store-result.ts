/**
 * backend/src/shared/db/store-result.ts
 *
 * WHY:
 * - Stores never throw at their callers: every operation returns either a value
 *   or a StoreError, and the caller decides what a failure means for them.
 * - One error class for the whole persistence boundary. Driver specifics stay on
 *   `cause` for diagnostics and never shape the caller's control flow.
 *
 * RULES:
 * - A missing row is NOT an error (ok + undefined).
 * - 'invalid_row': the statement ran but a row could not be mapped (e.g. an
 *   unknown role_id). 'driver' is everything the database itself rejected.
 * - `meta` carries identifiers only (ids, emails); never passwords.
 */

export const STORE_ERROR_KINDS = ['driver', 'invalid_query', 'invalid_row'] as const;

export type StoreErrorKind = (typeof STORE_ERROR_KINDS)[number];
export type StoreErrorMeta = Record<string, unknown>;

export class StoreError extends Error {
  readonly statement: string;
  readonly kind: StoreErrorKind;
  readonly meta: StoreErrorMeta;

  constructor(opts: {
    statement: string;
    message: string;
    kind?: StoreErrorKind;
    meta?: StoreErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'StoreError';
    this.statement = opts.statement;
    this.kind = opts.kind ?? 'driver';
    this.meta = opts.meta ?? {};
  }
}

export type StoreOk<T> = { ok: true; value: T };
export type StoreErr = { ok: false; error: StoreError };
export type StoreResult<T> = StoreOk<T> | StoreErr;

export function storeOk<T>(value: T): StoreOk<T> {
  return { ok: true, value };
}

export function storeErr(error: StoreError): StoreErr {
  return { ok: false, error };
}

export function isStoreOk<T>(result: StoreResult<T>): result is StoreOk<T> {
  return result.ok;
}

/**
 * For call sites that treat a store failure as fatal (scripts, seeds):
 * returns the value or throws the StoreError.
 */
export function unwrapStoreResult<T>(result: StoreResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

/** Driver errors are not always Error instances (pg can reject with strings). */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
