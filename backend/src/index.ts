/**
 * backend/src/index.ts
 *
 * WHY:
 * - Public entry of the backend package. Request handlers (and the web layer
 *   that hosts them) build the app once and use `deps.users.userRecordStore`.
 *
 * HOW TO USE:
 * - const { deps, close } = await buildApp(buildConfig())
 */

export { buildApp } from './app/build-app';
export type { BuiltApp } from './app/build-app';
export { buildConfig } from './app/config';
export type { AppConfig, NodeEnv } from './app/config';
export type { AppDeps } from './app/di';

export { StoreError, isStoreOk, unwrapStoreResult } from './shared/db/store-result';
export type { StoreErrorKind, StoreResult } from './shared/db/store-result';
export { migrateToLatest } from './shared/db/migrator';

export * from './modules/users';
