/**
 * @module core/errors
 * Custom error types for Sluice deployment operations.
 */

/**
 * Base error class for all Sluice errors.
 * Provides a consistent error hierarchy with error codes for programmatic handling.
 */
export class SluiceError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'SluiceError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when the connection to SQL Server cannot be established or is lost.
 *
 * Never retried automatically: re-sending a batch after a transport failure
 * may apply it twice.
 */
export class ConnectionError extends SluiceError {
  constructor(message: string, cause?: Error) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * A single batch of a script failed on the server.
 * Covers syntax errors, constraint violations and errors the script raises itself.
 */
export class BatchExecutionError extends SluiceError {
  /** Identity of the script the batch belongs to */
  readonly Script: string;

  /** 1-based index of the failing batch */
  readonly BatchIndex: number;

  /** Number of batches in the script */
  readonly TotalBatches: number;

  /** 1-based line in the script where the failing batch starts */
  readonly StartLine: number;

  /** Leading part of the failing batch's SQL */
  readonly FailedSQL?: string;

  constructor(
    script: string,
    batchIndex: number,
    totalBatches: number,
    startLine: number,
    message: string,
    failedSQL?: string,
    cause?: Error,
    code: string = 'BATCH_EXECUTION_FAILED'
  ) {
    super(code, message, cause);
    this.name = 'BatchExecutionError';
    this.Script = script;
    this.BatchIndex = batchIndex;
    this.TotalBatches = totalBatches;
    this.StartLine = startLine;
    this.FailedSQL = failedSQL;
  }
}

/**
 * A batch did not finish within the configured per-batch timeout.
 */
export class BatchTimeoutError extends BatchExecutionError {
  /** The timeout that elapsed, in milliseconds */
  readonly TimeoutMS: number;

  constructor(
    script: string,
    batchIndex: number,
    totalBatches: number,
    startLine: number,
    timeoutMS: number,
    failedSQL?: string
  ) {
    super(
      script,
      batchIndex,
      totalBatches,
      startLine,
      `Batch ${batchIndex}/${totalBatches} (line ${startLine}) of ${script} timed out after ${timeoutMS}ms`,
      failedSQL,
      undefined,
      'BATCH_TIMEOUT'
    );
    this.name = 'BatchTimeoutError';
    this.TimeoutMS = timeoutMS;
  }
}

/**
 * A catalog lookup failed for a reason other than a lost connection.
 */
export class CatalogQueryError extends SluiceError {
  /** The qualified object name that was being looked up */
  readonly Object: string;

  constructor(object: string, message: string, cause?: Error) {
    super('CATALOG_QUERY_FAILED', message, cause);
    this.name = 'CatalogQueryError';
    this.Object = object;
  }
}

/**
 * Thrown when a transaction fails to begin, commit or roll back.
 */
export class TransactionError extends SluiceError {
  constructor(message: string, cause?: Error) {
    super('TRANSACTION_FAILED', message, cause);
    this.name = 'TransactionError';
  }
}

/**
 * Recorded when a caller cancels a run. The batch in flight is allowed to
 * finish; nothing after it is executed.
 */
export class RunCancelledError extends SluiceError {
  constructor(message: string = 'Run cancelled') {
    super('RUN_CANCELLED', message);
    this.name = 'RunCancelledError';
  }
}

/**
 * Thrown when a script file cannot be loaded: bad filename, unsupported
 * encoding or a malformed directive.
 */
export class ScriptParseError extends SluiceError {
  /** The file that could not be parsed */
  readonly Filename: string;

  constructor(filename: string, message: string) {
    super('SCRIPT_PARSE_FAILED', message);
    this.name = 'ScriptParseError';
    this.Filename = filename;
  }
}

/**
 * Thrown when scripts cannot be ordered because their dependency
 * directives form a cycle.
 */
export class ScriptOrderError extends SluiceError {
  /** Scripts that could not be placed: the cycle and everything waiting on it */
  readonly Scripts: string[];

  constructor(scripts: string[]) {
    super(
      'SCRIPT_ORDER_FAILED',
      `Cannot order scripts: dependency cycle among ${scripts.join(', ')}`
    );
    this.name = 'ScriptOrderError';
    this.Scripts = scripts;
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
