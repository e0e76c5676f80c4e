/**
 * @module executor/runner
 * Applies an ordered list of scripts inside a transaction scope.
 *
 * **Transaction modes**: in `'per-script'` mode each script gets its own
 * transaction; a failing script is rolled back and the run moves on (or
 * stops, with `StopOnFailure`). In `'all-or-nothing'` mode the run is one
 * transaction and the first failure rolls back every script of the run.
 *
 * **Session state**: the run owns one session. Before each script the
 * session settings are reset, so a `SET` in one script never reaches the
 * next, while batches within a script still share them.
 *
 * **Stopping early**: cancellation, a lost connection or a failed
 * commit/rollback ends the run. Every input script still gets a result;
 * the ones never reached are reported as `not-attempted`.
 */

import { DatabaseSession } from '../db/types';
import { Script } from '../scripts/types';
import { IdempotentApplier } from './applier';
import {
  ApplyResult,
  CreateApplyResult,
  ExecutionCallbacks,
  MarkRolledBack,
  NotAttempted,
  RunResult,
  TransactionMode,
} from './types';
import { RunCancelledError, SluiceError, toError } from '../core/errors';

/**
 * Options for {@link MigrationRunner}.
 */
export interface RunnerOptions {
  /**
   * In `'per-script'` mode, stop at the first failed script instead of
   * continuing with the next one. Defaults to false.
   */
  StopOnFailure?: boolean;

  Callbacks?: ExecutionCallbacks;
}

/**
 * Why a run stopped before reaching every script.
 */
interface RunStop {
  Cancelled: boolean;
  Error?: SluiceError;
}

export class MigrationRunner {
  private readonly applier: IdempotentApplier;
  private readonly options: RunnerOptions;
  private running = false;

  constructor(applier: IdempotentApplier, options: RunnerOptions = {}) {
    this.applier = applier;
    this.options = options;
  }

  /**
   * Applies scripts strictly in the given order.
   *
   * @param scripts - Scripts in deployment order
   * @param session - Session owned by this run for its whole duration
   * @param mode - Transaction mode. Defaults to `'per-script'`
   * @param signal - Cancellation; checked before each script and between batches
   * @returns One result per script plus the run-level outcome
   * @throws SluiceError with code `RUN_IN_PROGRESS` if this runner is already running
   */
  async Run(
    scripts: readonly Script[],
    session: DatabaseSession,
    mode: TransactionMode = 'per-script',
    signal?: AbortSignal
  ): Promise<RunResult> {
    if (this.running) {
      throw new SluiceError('RUN_IN_PROGRESS', 'A run is already in progress on this runner');
    }

    this.running = true;
    const startTime = Date.now();

    try {
      const outcome =
        mode === 'all-or-nothing'
          ? await this.runAllOrNothing(scripts, session, signal)
          : await this.runPerScript(scripts, session, signal);

      const results = [
        ...outcome.Results,
        ...scripts.slice(outcome.Results.length).map(NotAttempted),
      ];

      return {
        Mode: mode,
        Results: results,
        Succeeded:
          !outcome.Stop && results.every((r) => r.Succeeded && !r.RolledBack),
        Cancelled: outcome.Stop?.Cancelled ?? false,
        ...(outcome.Stop?.Error ? { Error: outcome.Stop.Error } : {}),
        ExecutionTimeMS: Date.now() - startTime,
      };
    } finally {
      this.running = false;
    }
  }

  /**
   * Each script in its own transaction.
   */
  private async runPerScript(
    scripts: readonly Script[],
    session: DatabaseSession,
    signal?: AbortSignal
  ): Promise<{ Results: ApplyResult[]; Stop?: RunStop }> {
    const results: ApplyResult[] = [];
    this.log('Running in per-script mode — each script in its own transaction');

    for (const script of scripts) {
      if (signal?.aborted) {
        this.log('Run cancelled');
        return { Results: results, Stop: { Cancelled: true } };
      }

      try {
        await session.ResetSessionState();
        await session.BeginTransaction();
      } catch (err) {
        const error = asSluiceError(err);
        results.push(failedByRunError(script, error));
        return { Results: results, Stop: { Cancelled: false, Error: error } };
      }

      let result: ApplyResult;
      try {
        result = await this.applier.Apply(script, session, signal);
      } catch (err) {
        const error = asSluiceError(err);
        const rollbackError = await this.tryRollback(session);
        results.push(failedByRunError(script, error, rollbackError === undefined));
        return { Results: results, Stop: { Cancelled: false, Error: error } };
      }

      if (result.Succeeded) {
        try {
          await session.Commit();
        } catch (err) {
          // SQL Server rolls a transaction back when its COMMIT fails
          const error = asSluiceError(err);
          results.push(failedByRunError(script, error, true, result));
          return { Results: results, Stop: { Cancelled: false, Error: error } };
        }
        results.push(result);
        continue;
      }

      const rollbackError = await this.tryRollback(session);
      if (rollbackError) {
        results.push(result);
        return { Results: results, Stop: { Cancelled: false, Error: rollbackError } };
      }

      results.push(MarkRolledBack(result));
      this.log(`Script ${script.Name} rolled back`);

      if (result.Error instanceof RunCancelledError) {
        return { Results: results, Stop: { Cancelled: true } };
      }
      if (this.options.StopOnFailure) {
        return { Results: results, Stop: { Cancelled: false } };
      }
    }

    return { Results: results };
  }

  /**
   * The whole run in one transaction.
   */
  private async runAllOrNothing(
    scripts: readonly Script[],
    session: DatabaseSession,
    signal?: AbortSignal
  ): Promise<{ Results: ApplyResult[]; Stop?: RunStop }> {
    const results: ApplyResult[] = [];

    try {
      await session.BeginTransaction();
    } catch (err) {
      return { Results: results, Stop: { Cancelled: false, Error: asSluiceError(err) } };
    }
    this.log('Transaction started (all-or-nothing mode)');

    const abandon = async (stop: RunStop): Promise<{ Results: ApplyResult[]; Stop: RunStop }> => {
      const rollbackError = await this.tryRollback(session);
      if (rollbackError) {
        return { Results: results, Stop: { Cancelled: stop.Cancelled, Error: stop.Error ?? rollbackError } };
      }
      this.log('Transaction rolled back — no scripts of this run remain applied');
      return { Results: results.map(MarkRolledBack), Stop: stop };
    };

    for (const script of scripts) {
      if (signal?.aborted) {
        this.log('Run cancelled');
        return abandon({ Cancelled: true });
      }

      let result: ApplyResult;
      try {
        await session.ResetSessionState();
        result = await this.applier.Apply(script, session, signal);
      } catch (err) {
        const error = asSluiceError(err);
        results.push(failedByRunError(script, error));
        return abandon({ Cancelled: false, Error: error });
      }

      results.push(result);

      if (!result.Succeeded) {
        this.log(`Script ${script.Name} failed. Rolling back entire run...`);
        return abandon({ Cancelled: result.Error instanceof RunCancelledError });
      }
    }

    try {
      await session.Commit();
    } catch (err) {
      // SQL Server rolls a transaction back when its COMMIT fails
      const error = asSluiceError(err);
      return { Results: results.map(MarkRolledBack), Stop: { Cancelled: false, Error: error } };
    }
    this.log('Transaction committed — all scripts applied');

    return { Results: results };
  }

  /**
   * Rolls back the open transaction.
   * A rollback failure is returned (and logged) rather than thrown; the
   * caller surfaces it as the run's error.
   */
  private async tryRollback(session: DatabaseSession): Promise<SluiceError | undefined> {
    try {
      await session.Rollback();
      return undefined;
    } catch (err) {
      const error = asSluiceError(err);
      this.log(`Rollback failed: ${error.message}`);
      return error;
    }
  }

  private log(message: string): void {
    this.options.Callbacks?.OnLog?.(message);
  }
}

/**
 * Result for a script cut short by a run-level error: session reset,
 * transaction begin or commit, lost connection.
 */
function failedByRunError(
  script: Script,
  error: SluiceError,
  rolledBack: boolean = false,
  partial?: ApplyResult
): ApplyResult {
  return CreateApplyResult(script, {
    Status: 'failed',
    BatchesApplied: partial?.BatchesApplied ?? 0,
    TotalBatches: partial?.TotalBatches ?? 0,
    ExecutionTimeMS: partial?.ExecutionTimeMS ?? 0,
    PreviouslyExisted: partial?.PreviouslyExisted ?? null,
    RolledBack: rolledBack,
    Error: error,
  });
}

function asSluiceError(err: unknown): SluiceError {
  if (err instanceof SluiceError) {
    return err;
  }
  const error = toError(err);
  return new SluiceError('UNEXPECTED_ERROR', error.message, error);
}
