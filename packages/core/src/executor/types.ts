/**
 * @module executor/types
 * Per-script and per-run outcomes, plus the progress callbacks the
 * applier and runner report through.
 */

import { ObjectRef, Script } from '../scripts/types';
import { SluiceError } from '../core/errors';
import { SQLBatch } from './sql-splitter';
import { BatchOutput } from '../db/types';

/**
 * Controls how transactions wrap a run.
 *
 * - `'per-script'`: Each script runs in its own transaction. A failing
 *   script is rolled back on its own; scripts before it stay committed.
 *   The default.
 *
 * - `'all-or-nothing'`: The whole run is one transaction. Any failure
 *   rolls back every script of the run.
 */
export type TransactionMode = 'per-script' | 'all-or-nothing';

/**
 * Outcome of a single script.
 */
export type ApplyStatus = 'succeeded' | 'failed' | 'not-attempted';

/**
 * Per-script outcome. Frozen once created.
 */
export interface ApplyResult {
  /** Identity of the script */
  readonly Script: string;

  /** The object the script defines, when known */
  readonly Target: ObjectRef | null;

  readonly Status: ApplyStatus;

  /** Shorthand for `Status === 'succeeded'` */
  readonly Succeeded: boolean;

  /** Batches that executed without error before the script stopped */
  readonly BatchesApplied: number;

  /** Batches in the script; 0 when the script was never split */
  readonly TotalBatches: number;

  readonly ExecutionTimeMS: number;

  /** Whether the target existed before the first batch ran; null when not looked up */
  readonly PreviouslyExisted: boolean | null;

  /** True when the script's effects were undone by a rollback */
  readonly RolledBack: boolean;

  /** Why the script failed */
  readonly Error?: SluiceError;
}

/**
 * Outcome of a run over an ordered list of scripts.
 */
export interface RunResult {
  Mode: TransactionMode;

  /** One result per input script, in input order */
  Results: ApplyResult[];

  /** True only if every script succeeded and stayed committed */
  Succeeded: boolean;

  /** True when the run stopped on a cancellation request */
  Cancelled: boolean;

  /** Run-level failure: lost connection, failed commit or rollback */
  Error?: SluiceError;

  ExecutionTimeMS: number;
}

/**
 * Callbacks for reporting execution progress.
 */
export interface ExecutionCallbacks {
  /** Called before a script starts executing */
  OnScriptStart?: (script: Script) => void;

  /** Called after a script completes (success or failure) */
  OnScriptEnd?: (result: ApplyResult) => void;

  /** Called before each batch within a script */
  OnBatchStart?: (script: Script, batch: SQLBatch) => void;

  /**
   * Called after each execution of a batch with what the server returned.
   * Only invoked when output display is enabled.
   */
  OnOutput?: (script: Script, batch: SQLBatch, output: BatchOutput) => void;

  /** Called for informational log messages */
  OnLog?: (message: string) => void;
}

/**
 * Builds a frozen `ApplyResult`.
 */
export function CreateApplyResult(
  script: Script,
  fields: Omit<ApplyResult, 'Script' | 'Target' | 'Succeeded'>
): ApplyResult {
  return Object.freeze({
    Script: script.Name,
    Target: script.Target,
    Succeeded: fields.Status === 'succeeded',
    ...fields,
  });
}

/**
 * Result for a script the run never reached.
 */
export function NotAttempted(script: Script): ApplyResult {
  return CreateApplyResult(script, {
    Status: 'not-attempted',
    BatchesApplied: 0,
    TotalBatches: 0,
    ExecutionTimeMS: 0,
    PreviouslyExisted: null,
    RolledBack: false,
  });
}

/**
 * Derives a copy of a result whose effects were rolled back.
 */
export function MarkRolledBack(result: ApplyResult): ApplyResult {
  return Object.freeze({ ...result, RolledBack: true });
}
