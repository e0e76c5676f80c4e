/**
 * @module db/mssql-session
 * `DatabaseSession` over an `mssql` connection pool.
 *
 * The pool holds exactly one connection (see `ConnectionManager`), so every
 * request from this session lands on the same server session and
 * `SET` options persist from batch to batch. While a transaction is open,
 * requests are bound to it; the pool's only connection is held by the
 * transaction and a pool-level request would wait forever.
 */

import * as sql from 'mssql';
import { BatchOutput, CatalogEntry, DatabaseSession } from './types';
import { MapCatalogType, SESSION_RESET_SQL } from './mssql-dialect';
import { ObjectRef } from '../scripts/types';
import { ConnectionError, TransactionError, toError } from '../core/errors';

/**
 * Driver error codes that mean the connection itself is gone.
 */
const CONNECTION_ERROR_CODES = new Set(['ENOCONN', 'ECONNCLOSED', 'ESOCKET', 'ELOGIN', 'EINSTLOOKUP']);

interface CatalogRow {
  type: string;
}

interface InfoMessage {
  message: string;
}

export class MssqlSession implements DatabaseSession {
  private readonly pool: sql.ConnectionPool;
  private transaction: sql.Transaction | null = null;

  constructor(pool: sql.ConnectionPool) {
    this.pool = pool;
  }

  get InTransaction(): boolean {
    return this.transaction !== null;
  }

  async ExecuteBatch(text: string, signal?: AbortSignal): Promise<BatchOutput> {
    const request = this.createRequest();
    const messages: string[] = [];
    request.on('info', (info: InfoMessage) => {
      messages.push(info.message);
    });
    const onAbort = (): void => {
      request.cancel();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await request.batch<Record<string, unknown>>(text);
      const rowsAffected = result.rowsAffected;
      return {
        RowsAffected: rowsAffected.length > 0 ? rowsAffected.reduce((sum, n) => sum + n, 0) : null,
        Recordsets: result.recordsets.map((recordset) => Array.from(recordset)),
        Messages: messages,
      };
    } catch (err) {
      throw TranslateDriverError(err);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async QueryCatalog(ref: ObjectRef): Promise<CatalogEntry> {
    const request = this.createRequest();
    request.input('schema', sql.NVarChar(128), ref.Schema);
    request.input('name', sql.NVarChar(128), ref.Name);

    try {
      const result = await request.query<CatalogRow>(`
        SELECT o.[type] AS [type]
        FROM sys.objects o
        INNER JOIN sys.schemas s ON s.[schema_id] = o.[schema_id]
        WHERE s.[name] = @schema AND o.[name] = @name
      `);

      if (result.recordset.length === 0) {
        return { Exists: false, Kind: null };
      }
      return { Exists: true, Kind: MapCatalogType(result.recordset[0].type) };
    } catch (err) {
      throw TranslateDriverError(err);
    }
  }

  async BeginTransaction(): Promise<void> {
    if (this.transaction) {
      throw new TransactionError('A transaction is already open on this session');
    }

    const transaction = new sql.Transaction(this.pool);
    // The server can abort the transaction on its own (XACT_ABORT, severe errors)
    transaction.on('rollback', (aborted: boolean) => {
      if (aborted && this.transaction === transaction) {
        this.transaction = null;
      }
    });

    try {
      await transaction.begin();
    } catch (err) {
      throw wrapTransactionError('Failed to begin transaction', err);
    }
    this.transaction = transaction;
  }

  async Commit(): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      throw new TransactionError('Cannot commit: no open transaction (it may have been aborted by the server)');
    }

    try {
      await transaction.commit();
    } catch (err) {
      throw wrapTransactionError('Failed to commit transaction', err);
    } finally {
      this.transaction = null;
    }
  }

  async Rollback(): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      // Already rolled back by the server
      return;
    }

    try {
      await transaction.rollback();
    } catch (err) {
      // The transaction is still open on the server; keep it so Close() can retry
      throw wrapTransactionError('Failed to roll back transaction', err);
    }
    this.transaction = null;
  }

  async ResetSessionState(): Promise<void> {
    await this.ExecuteBatch(SESSION_RESET_SQL);
  }

  async Close(): Promise<void> {
    await this.Rollback();
  }

  private createRequest(): sql.Request {
    if (this.transaction) {
      return new sql.Request(this.transaction);
    }
    return new sql.Request(this.pool);
  }
}

/**
 * Maps `mssql` driver errors onto the Sluice taxonomy: transport failures
 * become `ConnectionError`, anything else is returned as an `Error`.
 */
export function TranslateDriverError(err: unknown): Error {
  if (err instanceof ConnectionError) {
    return err;
  }
  if (err instanceof sql.ConnectionError) {
    return new ConnectionError(`Connection to SQL Server failed: ${err.message}`, err);
  }
  if (err instanceof sql.MSSQLError && CONNECTION_ERROR_CODES.has(err.code)) {
    return new ConnectionError(`Connection to SQL Server lost: ${err.message}`, err);
  }
  return toError(err);
}

function wrapTransactionError(message: string, err: unknown): Error {
  const translated = TranslateDriverError(err);
  if (translated instanceof ConnectionError) {
    return translated;
  }
  return new TransactionError(`${message}: ${translated.message}`, translated);
}
