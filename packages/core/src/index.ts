/**
 * @module @sluice/core
 *
 * Sluice applies idempotent SQL Server object-definition scripts
 * (procedures, views, functions, triggers) batch by batch, with existence
 * checks and transactional rollback.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Sluice } from '@sluice/core';
 *
 * const sluice = new Sluice({
 *   Database: {
 *     Server: 'localhost',
 *     Database: 'my_app',
 *     User: 'sa',
 *     Password: 'test-secret',
 *   },
 *   Scripts: {
 *     Locations: ['./database'],
 *   },
 *   TransactionMode: 'per-script',
 * });
 *
 * const result = await sluice.Deploy();
 * console.log(`Applied ${result.ScriptsApplied} scripts`);
 *
 * await sluice.Close();
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { Sluice } from './core/sluice';
export type {
  DeployResult,
  DropResult,
  ObjectState,
  ObjectStatus,
  SluiceCallbacks,
  SluiceDependencies,
} from './core/sluice';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveConfig } from './core/config';
export type {
  SluiceConfig,
  ScriptConfig,
  HistoryConfig,
  ResolvedSluiceConfig,
  TransactionMode,
} from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type {
  DatabaseConfig,
  DatabaseConnectionOptions,
  DatabaseAccess,
  DatabaseSession,
  CatalogEntry,
  BatchOutput,
} from './db/types';
export { ConnectionManager } from './db/connection';
export { MssqlSession, TranslateDriverError } from './db/mssql-session';
export { FormatDropStatement, MapCatalogType, QuoteIdentifier, QuoteObjectRef } from './db/mssql-dialect';

// ─── Scripts ─────────────────────────────────────────────────────────
export type { ObjectKind, CatalogKind, IdentifierCase, ObjectRef, Script } from './scripts/types';
export { ParseObjectRef, FormatObjectRef, ObjectRefsEqual } from './scripts/object-ref';
export { ParseScriptPath, ParseDependencies } from './scripts/parser';
export type { ScriptLocation } from './scripts/parser';
export { ComputeChecksum } from './scripts/checksum';
export { CreateScript, ScanScripts, LoadScript, LoadScripts } from './scripts/scanner';
export type { ScriptSource, ScanWarningCallback } from './scripts/scanner';
export { OrderScripts, DEFAULT_KIND_ORDER } from './scripts/ordering';
export type { OrderOptions } from './scripts/ordering';

// ─── Executor ────────────────────────────────────────────────────────
export { SplitBatches, BatchSequence } from './executor/sql-splitter';
export type { SQLBatch, SplitOptions } from './executor/sql-splitter';
export { SubstitutePlaceholders } from './executor/placeholder';
export type { PlaceholderContext } from './executor/placeholder';
export { ObjectExistenceChecker } from './executor/existence-checker';
export { IdempotentApplier } from './executor/applier';
export type { ApplierOptions } from './executor/applier';
export { MigrationRunner } from './executor/runner';
export type { RunnerOptions } from './executor/runner';
export type { ApplyResult, ApplyStatus, RunResult, ExecutionCallbacks } from './executor/types';

// ─── History ─────────────────────────────────────────────────────────
export { HistoryTable } from './history/history-table';
export type { HistoryRecord, HistoryStatus, DeploymentLedger, RunEntry } from './history/types';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  SluiceError,
  ConnectionError,
  BatchExecutionError,
  BatchTimeoutError,
  CatalogQueryError,
  TransactionError,
  RunCancelledError,
  ScriptParseError,
  ScriptOrderError,
} from './core/errors';
