/**
 * @module history/history-table
 * Manages the `sluice_deploy_history` table, creating it if it doesn't
 * exist, reading the recorded deployments, and appending a run's results.
 *
 * Rows are written after a run finishes, never inside a run's transaction,
 * so a rolled-back run still leaves its record behind.
 */

import * as sql from 'mssql';
import { DeploymentLedger, HistoryRecord, HistoryStatus, RunEntry } from './types';
import { FormatObjectRef } from '../scripts/object-ref';
import { ObjectKind } from '../scripts/types';
import { QuoteIdentifier } from '../db/mssql-dialect';

const OBJECT_KINDS: readonly ObjectKind[] = ['procedure', 'view', 'function', 'trigger'];

/**
 * Longest error message stored per row.
 */
const ERROR_MESSAGE_LENGTH = 4000;

interface HistoryRow {
  deploy_rank: number;
  run_id: string;
  script: string;
  object_name: string | null;
  object_kind: string | null;
  checksum: number;
  status: string;
  batches_applied: number;
  rolled_back: boolean;
  error_message: string | null;
  installed_by: string;
  installed_on: Date;
  execution_time: number;
}

/**
 * Deployment history stored in a SQL Server table.
 *
 * Reads and table creation run against the pool. A run's rows are written
 * inside one `sql.Transaction` that `RecordRun` hands to the rank query and
 * every insert.
 */
export class HistoryTable implements DeploymentLedger {
  private readonly schema: string;
  private readonly tableName: string;
  private readonly pool: sql.ConnectionPool;

  /**
   * @param pool - Connected SQL Server connection pool
   * @param schema - Schema name (e.g., "dbo")
   * @param tableName - History table name (default: "sluice_deploy_history")
   */
  constructor(pool: sql.ConnectionPool, schema: string, tableName: string = 'sluice_deploy_history') {
    this.pool = pool;
    this.schema = schema;
    this.tableName = tableName;
  }

  /**
   * The fully qualified table name: `[schema].[tableName]`.
   */
  get QualifiedName(): string {
    return `${QuoteIdentifier(this.schema)}.${QuoteIdentifier(this.tableName)}`;
  }

  /**
   * Creates the schema (if needed) and history table (if it doesn't exist).
   */
  async EnsureExists(): Promise<void> {
    const schemaRequest = new sql.Request(this.pool);
    schemaRequest.input('schema', sql.NVarChar(128), this.schema);
    schemaRequest.input('createSchema', sql.NVarChar(300), `CREATE SCHEMA ${QuoteIdentifier(this.schema)}`);
    await schemaRequest.batch(`
      IF NOT EXISTS (SELECT 1 FROM sys.schemas WHERE name = @schema)
      BEGIN
        EXEC sp_executesql @createSchema
      END
    `);

    const tableRequest = new sql.Request(this.pool);
    tableRequest.input('schema', sql.NVarChar(128), this.schema);
    tableRequest.input('table', sql.NVarChar(128), this.tableName);
    await tableRequest.batch(`
      IF NOT EXISTS (
        SELECT 1 FROM INFORMATION_SCHEMA.TABLES
        WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table
      )
      BEGIN
        CREATE TABLE ${this.QualifiedName} (
          [deploy_rank]      INT            NOT NULL,
          [run_id]           NVARCHAR(36)   NOT NULL,
          [script]           NVARCHAR(1000) NOT NULL,
          [object_name]      NVARCHAR(300)  NULL,
          [object_kind]      NVARCHAR(20)   NULL,
          [checksum]         INT            NOT NULL,
          [status]           NVARCHAR(20)   NOT NULL,
          [batches_applied]  INT            NOT NULL,
          [rolled_back]      BIT            NOT NULL,
          [error_message]    NVARCHAR(4000) NULL,
          [installed_by]     NVARCHAR(100)  NOT NULL,
          [installed_on]     DATETIME       NOT NULL DEFAULT GETDATE(),
          [execution_time]   INT            NOT NULL,
          CONSTRAINT ${QuoteIdentifier(`${this.tableName}_pk`)} PRIMARY KEY ([deploy_rank])
        );

        CREATE INDEX ${QuoteIdentifier(`${this.tableName}_script_idx`)}
          ON ${this.QualifiedName} ([script]);
      END
    `);
  }

  /**
   * Returns true if the history table exists in the database.
   */
  async Exists(): Promise<boolean> {
    const request = new sql.Request(this.pool);
    request.input('schema', sql.NVarChar(128), this.schema);
    request.input('table', sql.NVarChar(128), this.tableName);
    const result = await request.query<{ cnt: number }>(`
      SELECT COUNT(*) AS cnt
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table
    `);
    return result.recordset[0].cnt > 0;
  }

  /**
   * Retrieves all records ordered by deploy_rank; empty when the table is absent.
   */
  async GetAllRecords(): Promise<HistoryRecord[]> {
    if (!(await this.Exists())) {
      return [];
    }

    const request = new sql.Request(this.pool);
    const result = await request.query<HistoryRow>(
      `SELECT * FROM ${this.QualifiedName} ORDER BY [deploy_rank]`
    );
    return result.recordset.map(mapRowToRecord);
  }

  /**
   * Returns the next available deploy_rank value, read inside the run's transaction.
   */
  async GetNextRank(transaction: sql.Transaction): Promise<number> {
    const request = new sql.Request(transaction);
    const result = await request.query<{ next_rank: number }>(
      `SELECT ISNULL(MAX([deploy_rank]), 0) + 1 AS next_rank FROM ${this.QualifiedName}`
    );
    return result.recordset[0].next_rank;
  }

  /**
   * Appends a run's rows in one transaction.
   */
  async RecordRun(runId: string, entries: readonly RunEntry[], user: string): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const transaction = new sql.Transaction(this.pool);
    await transaction.begin();
    try {
      let rank = await this.GetNextRank(transaction);
      for (const entry of entries) {
        await this.InsertResult(entry, runId, rank++, user, transaction);
      }
      await transaction.commit();
    } catch (err) {
      await transaction.rollback();
      throw err;
    }
  }

  /**
   * Records one script outcome as part of the run's transaction.
   */
  async InsertResult(
    entry: RunEntry,
    runId: string,
    rank: number,
    user: string,
    transaction: sql.Transaction
  ): Promise<void> {
    const { Script: script, Result: result } = entry;
    const status: HistoryStatus = result.Succeeded ? 'succeeded' : 'failed';

    const request = new sql.Request(transaction);
    request.input('deployRank', sql.Int, rank);
    request.input('runId', sql.NVarChar(36), runId);
    request.input('script', sql.NVarChar(1000), script.Name);
    request.input('objectName', sql.NVarChar(300), script.Target ? FormatObjectRef(script.Target) : null);
    request.input('objectKind', sql.NVarChar(20), script.Target?.Kind ?? null);
    request.input('checksum', sql.Int, script.Checksum);
    request.input('status', sql.NVarChar(20), status);
    request.input('batchesApplied', sql.Int, result.BatchesApplied);
    request.input('rolledBack', sql.Bit, result.RolledBack);
    request.input(
      'errorMessage',
      sql.NVarChar(ERROR_MESSAGE_LENGTH),
      result.Error ? result.Error.message.substring(0, ERROR_MESSAGE_LENGTH) : null
    );
    request.input('installedBy', sql.NVarChar(100), user);
    request.input('executionTime', sql.Int, result.ExecutionTimeMS);

    await request.query(`
      INSERT INTO ${this.QualifiedName}
        ([deploy_rank], [run_id], [script], [object_name], [object_kind], [checksum],
         [status], [batches_applied], [rolled_back], [error_message], [installed_by], [execution_time])
      VALUES
        (@deployRank, @runId, @script, @objectName, @objectKind, @checksum,
         @status, @batchesApplied, @rolledBack, @errorMessage, @installedBy, @executionTime)
    `);
  }
}

function mapRowToRecord(row: HistoryRow): HistoryRecord {
  return {
    DeployRank: row.deploy_rank,
    RunId: row.run_id,
    Script: row.script,
    ObjectName: row.object_name,
    ObjectKind: toObjectKind(row.object_kind),
    Checksum: row.checksum,
    Status: row.status === 'succeeded' ? 'succeeded' : 'failed',
    BatchesApplied: row.batches_applied,
    RolledBack: row.rolled_back,
    ErrorMessage: row.error_message,
    InstalledBy: row.installed_by,
    InstalledOn: row.installed_on,
    ExecutionTime: row.execution_time,
  };
}

function toObjectKind(value: string | null): ObjectKind | null {
  return OBJECT_KINDS.find((kind) => kind === value) ?? null;
}
