/**
 * @module core/sluice
 * Main orchestrator for Sluice deployments.
 *
 * The `Sluice` class is the primary public API for programmatic usage.
 * It coordinates loading, ordering, applying and recording scripts.
 *
 * @example
 * ```typescript
 * import { Sluice } from '@sluice/core';
 *
 * const sluice = new Sluice({
 *   Database: { Server: 'localhost', Database: 'mydb', User: 'sa', Password: 'test-secret' },
 *   Scripts: { Locations: ['./database'] },
 *   TransactionMode: 'all-or-nothing',
 * });
 *
 * const result = await sluice.Deploy();
 * console.log(`Applied ${result.ScriptsApplied} of ${result.ScriptsFound} scripts`);
 *
 * await sluice.Close();
 * ```
 */

import { randomUUID } from 'crypto';
import { SluiceConfig, ResolvedSluiceConfig, resolveConfig } from './config';
import { ConnectionManager } from '../db/connection';
import { CatalogKind, Script } from '../scripts/types';
import { BatchOutput, DatabaseAccess, DatabaseSession } from '../db/types';
import { SQLBatch } from '../executor/sql-splitter';
import { FormatDropStatement } from '../db/mssql-dialect';
import { LoadScripts } from '../scripts/scanner';
import { OrderScripts } from '../scripts/ordering';
import { FormatObjectRef } from '../scripts/object-ref';
import { ObjectExistenceChecker } from '../executor/existence-checker';
import { IdempotentApplier } from '../executor/applier';
import { MigrationRunner } from '../executor/runner';
import { ApplyResult, ExecutionCallbacks, RunResult } from '../executor/types';
import { HistoryTable } from '../history/history-table';
import { DeploymentLedger, HistoryRecord, RunEntry } from '../history/types';
import { toError } from './errors';

/**
 * Result of a `Deploy()` operation.
 */
export interface DeployResult {
  /** Scripts discovered under the configured locations */
  ScriptsFound: number;

  /** Scripts that succeeded and stayed committed */
  ScriptsApplied: number;

  ScriptsFailed: number;

  ScriptsNotAttempted: number;

  /** Script names in deployment order */
  Plan: string[];

  /** True when nothing was executed because `DryRun` is set */
  DryRun: boolean;

  /** The runner's outcome; null for dry runs and failures before the run started */
  Run: RunResult | null;

  TotalExecutionTimeMS: number;

  /** Whether every script was applied */
  Success: boolean;

  /** Error message if the deployment failed */
  ErrorMessage?: string;
}

/**
 * State of a script's target in the database.
 *
 * - `'present'`: an object with the target's name and kind exists
 * - `'missing'`: no object with the target's name exists
 * - `'kind-mismatch'`: an object with the name exists but is of another kind
 * - `'untracked'`: the script has no target to check
 */
export type ObjectState = 'present' | 'missing' | 'kind-mismatch' | 'untracked';

/**
 * One entry of a `Status()` report.
 */
export interface ObjectStatus {
  Script: string;

  /** `schema.name` of the target, or null */
  Object: string | null;

  State: ObjectState;

  /** Kind reported by the catalog, or null when nothing exists under the name */
  CatalogKind: CatalogKind | null;

  /** Most recent successful, committed deployment of this script */
  LastDeployment: HistoryRecord | null;

  /** Whether the script changed since its last deployment; null when never deployed */
  ChecksumChanged: boolean | null;
}

/**
 * Result of a `Drop()` operation.
 */
export interface DropResult {
  /** Objects dropped, as `schema.name` */
  Dropped: string[];

  /** Objects that did not exist */
  Skipped: string[];

  Cancelled: boolean;

  Success: boolean;

  ErrorMessage?: string;
}

/**
 * Callback interface for observing deployment progress.
 */
export interface SluiceCallbacks {
  /** Called when a script starts executing */
  OnScriptStart?: (script: Script) => void;

  /** Called when a script finishes (success or failure) */
  OnScriptEnd?: (result: ApplyResult) => void;

  /** Called with each batch's result sets and messages when `DisplayOutput` is set */
  OnOutput?: (script: Script, batch: SQLBatch, output: BatchOutput) => void;

  /** Called for informational log messages */
  OnLog?: (message: string) => void;
}

/**
 * Replacements for the SQL Server connection and history table.
 */
export interface SluiceDependencies {
  Access?: DatabaseAccess;
  Ledger?: DeploymentLedger;
}

/**
 * The main Sluice deployment engine.
 *
 * - `Deploy()`: Apply every script in deployment order
 * - `Status()`: Report whether each script's object exists
 * - `Drop()`: Drop every script's object, in reverse order (destructive!)
 * - `History()`: Read the deployment history
 */
export class Sluice {
  private readonly config: ResolvedSluiceConfig;
  private readonly connectionManager: ConnectionManager | null;
  private readonly access: DatabaseAccess;
  private readonly checker = new ObjectExistenceChecker();
  private ledger: DeploymentLedger | null;
  private callbacks: SluiceCallbacks = {};

  constructor(config: SluiceConfig, dependencies: SluiceDependencies = {}) {
    this.config = resolveConfig(config);
    if (dependencies.Access) {
      this.connectionManager = null;
      this.access = dependencies.Access;
    } else {
      this.connectionManager = new ConnectionManager(this.config.Database);
      this.access = this.connectionManager;
    }
    this.ledger = dependencies.Ledger ?? null;
  }

  /**
   * Registers callbacks for observing deployment progress.
   * Returns `this` for chaining.
   *
   * @example
   * ```typescript
   * sluice
   *   .OnProgress({
   *     OnLog: (msg) => console.log(msg),
   *     OnScriptEnd: (r) => console.log(`${r.Script}: ${r.Status}`),
   *   })
   *   .Deploy();
   * ```
   */
  OnProgress(callbacks: SluiceCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Applies every script to the database.
   *
   * The workflow:
   * 1. Scan script directories and load `.sql` files
   * 2. Order them by kind and `depends-on` directives
   * 3. Run them on one session in the configured transaction mode
   * 4. Record every attempted script in the history table, if enabled
   *
   * Failures never throw; they are reported through `Success` and `ErrorMessage`.
   *
   * @param signal - Aborting it stops the run after the batch in flight
   */
  async Deploy(signal?: AbortSignal): Promise<DeployResult> {
    const startTime = Date.now();
    let scripts: Script[] = [];

    try {
      scripts = await this.loadOrderedScripts();
      const plan = scripts.map((s) => s.Name);

      if (this.config.DryRun) {
        this.log(`Dry run: ${scripts.length} script(s) would be applied`);
        return {
          ScriptsFound: scripts.length,
          ScriptsApplied: 0,
          ScriptsFailed: 0,
          ScriptsNotAttempted: scripts.length,
          Plan: plan,
          DryRun: true,
          Run: null,
          TotalExecutionTimeMS: Date.now() - startTime,
          Success: true,
        };
      }

      if (scripts.length === 0) {
        this.log('No scripts to apply.');
        return {
          ScriptsFound: 0,
          ScriptsApplied: 0,
          ScriptsFailed: 0,
          ScriptsNotAttempted: 0,
          Plan: plan,
          DryRun: false,
          Run: null,
          TotalExecutionTimeMS: Date.now() - startTime,
          Success: true,
        };
      }

      const run = await this.withSession((session) => this.createRunner().Run(
        scripts,
        session,
        this.config.TransactionMode,
        signal
      ));

      if (this.config.History.Enabled) {
        await this.recordHistory(scripts, run.Results);
      }

      const applied = run.Results.filter((r) => r.Succeeded && !r.RolledBack).length;
      const failed = run.Results.filter((r) => r.Status === 'failed').length;
      const notAttempted = run.Results.filter((r) => r.Status === 'not-attempted').length;

      return {
        ScriptsFound: scripts.length,
        ScriptsApplied: applied,
        ScriptsFailed: failed,
        ScriptsNotAttempted: notAttempted,
        Plan: plan,
        DryRun: false,
        Run: run,
        TotalExecutionTimeMS: Date.now() - startTime,
        Success: run.Succeeded,
        ErrorMessage: run.Error?.message ?? run.Results.find((r) => r.Error)?.Error?.message,
      };
    } catch (err) {
      return {
        ScriptsFound: scripts.length,
        ScriptsApplied: 0,
        ScriptsFailed: 0,
        ScriptsNotAttempted: scripts.length,
        Plan: scripts.map((s) => s.Name),
        DryRun: this.config.DryRun,
        Run: null,
        TotalExecutionTimeMS: Date.now() - startTime,
        Success: false,
        ErrorMessage: toError(err).message,
      };
    }
  }

  /**
   * Returns the database state of every script's target, in deployment order.
   */
  async Status(): Promise<ObjectStatus[]> {
    const scripts = await this.loadOrderedScripts();
    const history = await this.History();

    return this.withSession(async (session) => {
      const statuses: ObjectStatus[] = [];

      for (const script of scripts) {
        const lastDeployment = findLastDeployment(history, script.Name);
        const checksumChanged = lastDeployment ? lastDeployment.Checksum !== script.Checksum : null;

        if (!script.Target) {
          statuses.push({
            Script: script.Name,
            Object: null,
            State: 'untracked',
            CatalogKind: null,
            LastDeployment: lastDeployment,
            ChecksumChanged: checksumChanged,
          });
          continue;
        }

        const entry = await this.checker.Lookup(script.Target, session);
        statuses.push({
          Script: script.Name,
          Object: FormatObjectRef(script.Target),
          State: !entry.Exists ? 'missing' : entry.Kind === script.Target.Kind ? 'present' : 'kind-mismatch',
          CatalogKind: entry.Kind,
          LastDeployment: lastDeployment,
          ChecksumChanged: checksumChanged,
        });
      }

      return statuses;
    });
  }

  /**
   * Drops the object of every script, last-deployed first, so dependents go
   * before what they depend on. Each drop is preceded by its own existence
   * check; objects of another kind under the same name are left alone.
   *
   * **WARNING:** This is destructive and cannot be undone.
   */
  async Drop(signal?: AbortSignal): Promise<DropResult> {
    const dropped: string[] = [];
    const skipped: string[] = [];

    try {
      const scripts = (await this.loadOrderedScripts()).reverse();

      return await this.withSession(async (session) => {
        for (const script of scripts) {
          if (!script.Target) {
            continue;
          }
          if (signal?.aborted) {
            this.log('Drop cancelled');
            return { Dropped: dropped, Skipped: skipped, Cancelled: true, Success: false };
          }

          const name = FormatObjectRef(script.Target);
          if (!(await this.checker.Exists(script.Target, session))) {
            skipped.push(name);
            continue;
          }

          await session.ExecuteBatch(FormatDropStatement(script.Target));
          dropped.push(name);
          this.log(`Dropped ${script.Target.Kind} ${name}`);
        }

        return { Dropped: dropped, Skipped: skipped, Cancelled: false, Success: true };
      });
    } catch (err) {
      return {
        Dropped: dropped,
        Skipped: skipped,
        Cancelled: false,
        Success: false,
        ErrorMessage: toError(err).message,
      };
    }
  }

  /**
   * Returns all history rows; empty when the table does not exist.
   */
  async History(): Promise<HistoryRecord[]> {
    const ledger = await this.getLedger();
    return ledger ? ledger.GetAllRecords() : [];
  }

  /**
   * Closes the database connection pool.
   */
  async Close(): Promise<void> {
    await this.connectionManager?.Disconnect();
  }

  private async loadOrderedScripts(): Promise<Script[]> {
    this.log('Scanning script files...');
    const loaded = await LoadScripts(this.config.Scripts.Locations, (warning) =>
      this.log(`Warning: ${warning}`)
    );
    this.log(`Found ${loaded.length} script file(s)`);

    return OrderScripts(loaded, {
      KindOrder: this.config.Scripts.KindOrder,
      IdentifierCase: this.config.Scripts.IdentifierCase,
    });
  }

  private createRunner(): MigrationRunner {
    const callbacks: ExecutionCallbacks = {
      OnScriptStart: this.callbacks.OnScriptStart,
      OnScriptEnd: this.callbacks.OnScriptEnd,
      OnOutput: this.callbacks.OnOutput,
      OnLog: this.callbacks.OnLog,
    };

    const applier = new IdempotentApplier(this.checker, {
      Separator: this.config.Scripts.Separator,
      Placeholders: this.config.Placeholders,
      PlaceholderContext: {
        Database: this.config.Database.Database,
        User: this.config.Database.User,
      },
      BatchTimeoutMS: this.config.BatchTimeoutMS,
      DisplayOutput: this.config.DisplayOutput,
      Callbacks: callbacks,
    });

    return new MigrationRunner(applier, {
      StopOnFailure: this.config.StopOnFailure,
      Callbacks: callbacks,
    });
  }

  /**
   * Opens a session, hands it to `work`, and closes it afterwards.
   */
  private async withSession<T>(work: (session: DatabaseSession) => Promise<T>): Promise<T> {
    const session = await this.access.OpenSession();
    try {
      return await work(session);
    } finally {
      await session.Close();
    }
  }

  /**
   * Writes attempted scripts to the ledger. A failure here is logged and
   * does not change the deployment's outcome.
   */
  private async recordHistory(scripts: readonly Script[], results: readonly ApplyResult[]): Promise<void> {
    const entries: RunEntry[] = [];
    results.forEach((result, index) => {
      if (result.Status !== 'not-attempted') {
        entries.push({ Script: scripts[index], Result: result });
      }
    });

    try {
      const ledger = await this.getLedger();
      if (!ledger) {
        this.log('Warning: history is enabled but no history table is available');
        return;
      }
      await ledger.EnsureExists();
      await ledger.RecordRun(randomUUID(), entries, this.config.Database.User);
      this.log(`Recorded ${entries.length} script(s) in history`);
    } catch (err) {
      this.log(`Warning: failed to record history: ${toError(err).message}`);
    }
  }

  private async getLedger(): Promise<DeploymentLedger | null> {
    if (!this.ledger && this.connectionManager) {
      await this.connectionManager.Connect();
      this.ledger = new HistoryTable(
        this.connectionManager.GetPool(),
        this.config.History.Schema,
        this.config.History.Table
      );
    }
    return this.ledger;
  }

  private log(message: string): void {
    this.callbacks.OnLog?.(message);
  }
}

/**
 * Most recent succeeded, not rolled back record for a script.
 */
function findLastDeployment(history: readonly HistoryRecord[], script: string): HistoryRecord | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const record = history[i];
    if (record.Script === script && record.Status === 'succeeded' && !record.RolledBack) {
      return record;
    }
  }
  return null;
}
