/**
 * @module executor/applier
 * Applies one script: substitutes placeholders, splits the script into
 * batches and runs them in order on a single session.
 *
 * The applier never decides whether an object should be dropped. Scripts
 * carry their own `IF OBJECT_ID(...) IS NOT NULL DROP ...` guard, and that
 * guard runs as an ordinary batch. The applier's job is to run every batch
 * in file order and stop at the first failure: later batches of a script
 * assume the state the earlier ones left behind.
 */

import { BatchOutput, DatabaseSession } from '../db/types';
import { Script } from '../scripts/types';
import { ScriptText } from '../scripts/scanner';
import { ObjectExistenceChecker } from './existence-checker';
import { SplitBatches, SQLBatch } from './sql-splitter';
import { SubstitutePlaceholders, PlaceholderContext } from './placeholder';
import { ApplyResult, CreateApplyResult, ExecutionCallbacks } from './types';
import {
  BatchExecutionError,
  BatchTimeoutError,
  ConnectionError,
  RunCancelledError,
  SluiceError,
  toError,
} from '../core/errors';

/**
 * Characters of a failing batch kept on its error.
 */
const FAILED_SQL_PREVIEW_LENGTH = 500;

/**
 * Options for {@link IdempotentApplier}.
 */
export interface ApplierOptions {
  /** Batch separator token. Defaults to `GO` */
  Separator?: string;

  /** User-defined placeholder values */
  Placeholders?: Record<string, string>;

  /** Database and user names for the built-in placeholders */
  PlaceholderContext?: Omit<PlaceholderContext, 'Filename' | 'Target' | 'Timestamp'>;

  /**
   * Per-batch timeout in milliseconds. On expiry the batch is cancelled
   * and the script fails. Null or 0 disables the timeout.
   */
  BatchTimeoutMS?: number | null;

  /**
   * Whether to look up the script's target before its first batch and
   * record the answer as `PreviouslyExisted`. Defaults to true.
   */
  CheckTarget?: boolean;

  /** Report each batch's result sets and messages through `OnOutput`. Defaults to false */
  DisplayOutput?: boolean;

  Callbacks?: ExecutionCallbacks;
}

export class IdempotentApplier {
  private readonly checker: ObjectExistenceChecker;
  private readonly options: ApplierOptions;

  constructor(checker: ObjectExistenceChecker = new ObjectExistenceChecker(), options: ApplierOptions = {}) {
    this.checker = checker;
    this.options = options;
  }

  /**
   * Applies a script on the given session.
   *
   * Batch failures are captured in the returned result; batches after the
   * failing one never run, and `BatchesApplied` counts the batches before it.
   *
   * @param script - Script to apply
   * @param session - Session the batches run on; its settings carry from batch to batch
   * @param signal - Checked between batches; the batch in flight always finishes
   * @returns The script's outcome
   * @throws ConnectionError if the connection is lost during the lookup or a batch
   */
  async Apply(script: Script, session: DatabaseSession, signal?: AbortSignal): Promise<ApplyResult> {
    const callbacks = this.options.Callbacks;
    callbacks?.OnScriptStart?.(script);
    const startTime = Date.now();

    // The lookup must happen before any batch, hence before the script's own drop
    let previouslyExisted: boolean | null = null;
    if (script.Target && (this.options.CheckTarget ?? true)) {
      previouslyExisted = await this.checker.Exists(script.Target, session);
    }

    const processedSQL = SubstitutePlaceholders(ScriptText(script), this.options.Placeholders ?? {}, {
      ...this.options.PlaceholderContext,
      Timestamp: new Date().toISOString(),
      Filename: script.Name,
      Target: script.Target,
    });
    const batches = SplitBatches(processedSQL, { Separator: this.options.Separator }).ToArray();

    callbacks?.OnLog?.(`Executing ${script.Name}: ${batches.length} batch(es)`);

    let batchesApplied = 0;
    const finish = (error?: SluiceError): ApplyResult => {
      const result = CreateApplyResult(script, {
        Status: error ? 'failed' : 'succeeded',
        BatchesApplied: batchesApplied,
        TotalBatches: batches.length,
        ExecutionTimeMS: Date.now() - startTime,
        PreviouslyExisted: previouslyExisted,
        RolledBack: false,
        ...(error ? { Error: error } : {}),
      });
      callbacks?.OnScriptEnd?.(result);
      return result;
    };

    for (const batch of batches) {
      if (batch.Index > 1 && signal?.aborted) {
        return finish(
          new RunCancelledError(
            `Run cancelled after batch ${batchesApplied}/${batches.length} of ${script.Name}`
          )
        );
      }

      callbacks?.OnBatchStart?.(script, batch);

      try {
        for (let repeat = 0; repeat < batch.RepeatCount; repeat++) {
          const output = await this.executeBatch(session, script, batch, batches.length);
          if (this.options.DisplayOutput) {
            callbacks?.OnOutput?.(script, batch, output);
          }
        }
      } catch (err) {
        if (err instanceof ConnectionError) {
          throw err;
        }
        return finish(this.toBatchError(err, script, batch, batches.length));
      }

      batchesApplied++;
    }

    return finish();
  }

  /**
   * Runs one batch, racing it against the per-batch timeout when one is set.
   * On timeout the batch is cancelled and awaited, so the session is idle
   * again before the caller rolls back.
   */
  private async executeBatch(
    session: DatabaseSession,
    script: Script,
    batch: SQLBatch,
    totalBatches: number
  ): Promise<BatchOutput> {
    const timeoutMS = this.options.BatchTimeoutMS;
    if (!timeoutMS) {
      return session.ExecuteBatch(batch.SQL);
    }

    const controller = new AbortController();
    const execution = session.ExecuteBatch(batch.SQL, controller.signal);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMS);
    });

    let output: BatchOutput | null;
    try {
      output = await Promise.race([execution, timeout]);
    } finally {
      clearTimeout(timer);
    }
    if (output) {
      return output;
    }

    controller.abort();
    // The cancelled request must settle before the connection takes another request
    const settled = await execution.then(
      () => null,
      (err: unknown) => err
    );
    if (settled instanceof ConnectionError) {
      throw settled;
    }

    throw new BatchTimeoutError(
      script.Name,
      batch.Index,
      totalBatches,
      batch.StartLine,
      timeoutMS,
      batch.SQL.substring(0, FAILED_SQL_PREVIEW_LENGTH)
    );
  }

  private toBatchError(
    err: unknown,
    script: Script,
    batch: SQLBatch,
    totalBatches: number
  ): BatchExecutionError {
    if (err instanceof BatchExecutionError) {
      return err;
    }

    const cause = toError(err);
    return new BatchExecutionError(
      script.Name,
      batch.Index,
      totalBatches,
      batch.StartLine,
      `Failed at batch ${batch.Index}/${totalBatches} (line ${batch.StartLine}) of ${script.Name}: ${cause.message}`,
      batch.SQL.substring(0, FAILED_SQL_PREVIEW_LENGTH),
      cause
    );
  }
}
