/**
 * @module executor/sql-splitter
 * Splits scripts into batches on a separator line.
 *
 * SQL Server uses `GO` as a client-side batch separator. It is NOT
 * a T-SQL statement. `sqlcmd` and SSMS split scripts on `GO` lines and
 * send each batch to the server on its own. Sluice does the same:
 * - the separator must be the sole content of its line (whitespace allowed)
 * - matching is case-insensitive; the token is configurable
 * - `GO n` repeats the preceding batch `n` times, as in sqlcmd
 * - the separator inside a string literal or comment is only recognised
 *   when it sits alone on a line; unbalanced quotes surface as server errors
 * - empty batches are discarded
 */

/**
 * A single SQL batch extracted from a script.
 */
export interface SQLBatch {
  /** 1-based position of the batch in the script */
  Index: number;

  /** The SQL text for this batch (without the separator line) */
  SQL: string;

  /**
   * Number of times to execute this batch.
   * Usually 1, but can be higher if `GO N` was used. Never below 1:
   * `GO 0` runs its batch once.
   */
  RepeatCount: number;

  /** 1-based line number where this batch starts in the original script */
  StartLine: number;
}

/**
 * Options for {@link SplitBatches}.
 */
export interface SplitOptions {
  /** Separator token. Defaults to `GO` */
  Separator?: string;
}

export const DEFAULT_SEPARATOR = 'GO';

/**
 * A lazy, restartable sequence of batches.
 *
 * Nothing is scanned until the sequence is iterated, and every iteration
 * scans the script again from the start.
 */
export class BatchSequence implements Iterable<SQLBatch> {
  private readonly script: string;
  private readonly pattern: RegExp;

  constructor(script: string, separator: string = DEFAULT_SEPARATOR) {
    this.script = script;
    this.pattern = CreateSeparatorPattern(separator);
  }

  *[Symbol.iterator](): Iterator<SQLBatch> {
    const lines = this.script.split(/\r\n|\r|\n/);

    let currentBatchLines: string[] = [];
    let batchStartLine = 1;
    let index = 0;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const separatorMatch = line.match(this.pattern);

      if (!separatorMatch) {
        currentBatchLines.push(line);
        continue;
      }

      const batchSQL = currentBatchLines.join('\n').trim();
      if (batchSQL.length > 0) {
        yield {
          Index: ++index,
          SQL: batchSQL,
          RepeatCount: separatorMatch[1] ? Math.max(1, parseInt(separatorMatch[1], 10)) : 1,
          StartLine: batchStartLine + leadingBlankLines(currentBatchLines),
        };
      }

      currentBatchLines = [];
      batchStartLine = i + 2; // Next line (1-based)
    }

    // Final batch (after the last separator, or the whole script if there is none)
    const finalSQL = currentBatchLines.join('\n').trim();
    if (finalSQL.length > 0) {
      yield {
        Index: ++index,
        SQL: finalSQL,
        RepeatCount: 1,
        StartLine: batchStartLine + leadingBlankLines(currentBatchLines),
      };
    }
  }

  /**
   * Materialises the sequence.
   */
  ToArray(): SQLBatch[] {
    return Array.from(this);
  }
}

/**
 * Splits a script into batches separated by a separator line.
 *
 * @param script - Full script content
 * @param options - Separator configuration
 * @returns Lazy sequence of non-empty batches in script order
 *
 * @example
 * ```typescript
 * const batches = SplitBatches("SET X ON\nGO\nCREATE PROCEDURE P AS THROW 1,'e',1;").ToArray();
 * // batches.length === 2
 * // batches[0].SQL === 'SET X ON'
 * // batches[1].SQL === "CREATE PROCEDURE P AS THROW 1,'e',1;"
 * ```
 */
export function SplitBatches(script: string, options: SplitOptions = {}): BatchSequence {
  return new BatchSequence(script, options.Separator ?? DEFAULT_SEPARATOR);
}

/**
 * Builds the regex matching a separator line for the given token.
 * Captures an optional repeat count after the token.
 *
 * Valid matches for `GO`:
 *   GO          → count = undefined (defaults to 1)
 *   GO 5        → count = 5
 *   go          → case-insensitive
 *     GO        → leading/trailing whitespace OK
 *
 * Does NOT match:
 *   GOTO        → token must be followed by whitespace, digits or EOL
 *   SELECT 'GO' → token is part of a larger line
 */
export function CreateSeparatorPattern(separator: string): RegExp {
  const token = separator.trim().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^\\s*${token}(?:\\s+(\\d+))?\\s*$`, 'i');
}

function leadingBlankLines(lines: string[]): number {
  let count = 0;
  while (count < lines.length && lines[count].trim() === '') {
    count++;
  }
  return count;
}
