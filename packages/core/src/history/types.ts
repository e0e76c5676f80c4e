/**
 * @module history/types
 * Type definitions for the deployment history ledger.
 */

import { ObjectKind, Script } from '../scripts/types';
import { ApplyResult } from '../executor/types';

/**
 * Status values stored in the history table. Scripts a run never reached
 * are not recorded.
 */
export type HistoryStatus = 'succeeded' | 'failed';

/**
 * A single row from the `sluice_deploy_history` table.
 */
export interface HistoryRecord {
  /** Sequential rank of this row (primary key) */
  DeployRank: number;

  /** Identifier shared by every row written for one run */
  RunId: string;

  /** Script identity (path relative to its location) */
  Script: string;

  /** `schema.name` of the script's target, or null for untargeted scripts */
  ObjectName: string | null;

  ObjectKind: ObjectKind | null;

  /** CRC32 checksum of the script when it ran */
  Checksum: number;

  Status: HistoryStatus;

  BatchesApplied: number;

  /** Whether the script's effects were rolled back */
  RolledBack: boolean;

  ErrorMessage: string | null;

  /** Database user who ran the script */
  InstalledBy: string;

  InstalledOn: Date;

  /** Execution time in milliseconds */
  ExecutionTime: number;
}

/**
 * One attempted script of a run, as handed to the ledger.
 */
export interface RunEntry {
  Script: Script;
  Result: ApplyResult;
}

/**
 * Storage for deployment history.
 */
export interface DeploymentLedger {
  /** Creates the schema and table if they don't exist */
  EnsureExists(): Promise<void>;

  Exists(): Promise<boolean>;

  /** All rows ordered by rank; empty when the table is absent */
  GetAllRecords(): Promise<HistoryRecord[]>;

  /**
   * Appends one row per entry, in order, under the given run id.
   */
  RecordRun(runId: string, entries: readonly RunEntry[], user: string): Promise<void>;
}
