/**
 * f3-data-tools - import utilities for the F3 Nation database
 *
 * The CLIs live in src/imports/; everything they use is exported here so the
 * two-phase plan/apply API can be driven from other tooling.
 */

export { createDb, schema } from './client';
export type { Database, DatabaseClient, Executor, Transaction } from './client';
export { ENVIRONMENTS, loadEnvironment, resolveDatabaseConfig } from './config';
export type { DatabaseConfig, Environment } from './config';
export * from './schema';

export { ImportValidationError, ImportWriteError, UsageError } from './lib/errors';
export type { ValidationKind } from './lib/errors';

// Backblast import
export {
  planBackblastImport,
  applyBackblastImport,
  prepareBackblastImport,
} from './backblasts/import';
export type { ImportPlan, ApplyOptions, ApplyResult } from './backblasts/import';
export { groupByEventKey, eventKeyOf } from './backblasts/event-key';
export type { EventKey, EventGroup } from './backblasts/event-key';
export { createBackblastDatabase, createBackblastStore } from './backblasts/store';
export type { BackblastDatabase, BackblastStore } from './backblasts/store';
export { renderBackoutSql, backoutFileName } from './backblasts/backout';
export { buildImportSummary, formatImportSummary } from './backblasts/summary';
export type { ImportSummary } from './backblasts/summary';
export { runBackblastImport } from './backblasts/run';

// User import
export { planUserImport, applyUserImport } from './users/import';
export type { UserImportPlan, UserApplyResult, UpsertedUser } from './users/import';
export { createUserDatabase, createUserStore } from './users/store';
export type { UserDatabase, UserStore } from './users/store';
export { runUserImport } from './users/run';
