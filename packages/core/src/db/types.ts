/**
 * @module db/types
 * Database connection configuration and the database-access interface
 * the engine runs scripts through.
 */

import { CatalogKind, ObjectRef } from '../scripts/types';

/**
 * Configuration for connecting to a SQL Server instance.
 * Maps directly to the `mssql` package connection options with
 * sensible defaults for deployment workloads.
 */
export interface DatabaseConfig {
  /** SQL Server hostname or IP address */
  Server: string;

  /** SQL Server port. Defaults to 1433 */
  Port?: number;

  /** Database name to connect to */
  Database: string;

  /** SQL Server login username */
  User: string;

  /** SQL Server login password */
  Password: string;

  /** Additional connection options */
  Options?: DatabaseConnectionOptions;
}

/**
 * Extended connection options for fine-tuning SQL Server connectivity.
 */
export interface DatabaseConnectionOptions {
  /** Whether to encrypt the connection. Defaults to false */
  Encrypt?: boolean;

  /** Whether to trust self-signed certificates. Defaults to true */
  TrustServerCertificate?: boolean;

  /** Enable arithmetic abort. Defaults to true */
  EnableArithAbort?: boolean;

  /** Driver-level request timeout in milliseconds. Defaults to 300000 (5 minutes) */
  RequestTimeout?: number;

  /** Connection timeout in milliseconds. Defaults to 30000 (30 seconds) */
  ConnectionTimeout?: number;
}

/**
 * What the catalog knows about an object.
 */
export interface CatalogEntry {
  Exists: boolean;

  /** Kind of the existing object, or null when it does not exist */
  Kind: CatalogKind | null;
}

/**
 * What the server sent back for one batch.
 */
export interface BatchOutput {
  /** Total rows affected, or null when the batch reported none */
  RowsAffected: number | null;

  /** Result sets in the order the batch produced them */
  Recordsets: Record<string, unknown>[][];

  /** `PRINT` and other informational messages, in arrival order */
  Messages: string[];
}

/**
 * One database session. Session-level settings (`SET QUOTED_IDENTIFIER`,
 * `SET ANSI_NULLS`, ...) made by a batch stay in effect for later batches
 * on the same session until {@link ResetSessionState} is called.
 *
 * A session is used by one run at a time.
 */
export interface DatabaseSession {
  /**
   * Sends one batch to the server.
   *
   * @param sql - Batch text, without separator lines
   * @param signal - Aborting it cancels the batch on the server. The
   *   returned promise settles once the server has stopped the batch
   * @returns Rows affected, result sets and messages
   * @throws ConnectionError when the connection is lost; any other error for a failed batch
   */
  ExecuteBatch(sql: string, signal?: AbortSignal): Promise<BatchOutput>;

  /**
   * Looks up an object's existence and kind with a single catalog query.
   *
   * @throws ConnectionError when the database is unreachable
   */
  QueryCatalog(ref: ObjectRef): Promise<CatalogEntry>;

  BeginTransaction(): Promise<void>;
  Commit(): Promise<void>;
  Rollback(): Promise<void>;

  /** True while a transaction begun on this session is open */
  readonly InTransaction: boolean;

  /**
   * Restores session settings to their connection defaults, so nothing
   * one script sets leaks into the next.
   */
  ResetSessionState(): Promise<void>;

  /** Releases the session. An open transaction is rolled back */
  Close(): Promise<void>;
}

/**
 * A database the engine can open sessions on.
 */
export interface DatabaseAccess {
  OpenSession(): Promise<DatabaseSession>;
}
