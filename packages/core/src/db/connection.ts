/**
 * @module db/connection
 * SQL Server connection pool management for Sluice.
 *
 * Provides a single-connection pool for sequential script execution.
 * All batches run through one connection, so session settings and the
 * transaction belong to one server session.
 */

import * as sql from 'mssql';
import { DatabaseAccess, DatabaseConfig, DatabaseSession } from './types';
import { MssqlSession, TranslateDriverError } from './mssql-session';
import { ConnectionError } from '../core/errors';

/**
 * Manages a SQL Server connection pool for deployments.
 * Uses a single-connection pool to guarantee that all batches within
 * a transaction share the same underlying connection.
 */
export class ConnectionManager implements DatabaseAccess {
  private pool: sql.ConnectionPool | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Opens the connection pool. Must be called before executing any SQL.
   * Safe to call multiple times; subsequent calls are no-ops if already connected.
   *
   * @throws ConnectionError if the server cannot be reached or the login fails
   */
  async Connect(): Promise<void> {
    if (this.pool?.connected) {
      return;
    }

    const mssqlConfig: sql.config = {
      server: this.config.Server,
      port: this.config.Port ?? 1433,
      user: this.config.User,
      password: this.config.Password,
      database: this.config.Database,
      options: {
        encrypt: this.config.Options?.Encrypt ?? false,
        trustServerCertificate: this.config.Options?.TrustServerCertificate ?? true,
        enableArithAbort: this.config.Options?.EnableArithAbort ?? true,
      },
      pool: {
        max: 1,
        min: 1,
      },
      requestTimeout: this.config.Options?.RequestTimeout ?? 300_000,
      connectionTimeout: this.config.Options?.ConnectionTimeout ?? 30_000,
    };

    const pool = new sql.ConnectionPool(mssqlConfig);
    try {
      await pool.connect();
    } catch (err) {
      const translated = TranslateDriverError(err);
      throw translated instanceof ConnectionError
        ? translated
        : new ConnectionError(
            `Cannot connect to ${this.config.Server}:${this.config.Port ?? 1433}/${this.config.Database}: ${translated.message}`,
            translated
          );
    }
    this.pool = pool;
  }

  /**
   * Returns the active connection pool.
   * @throws ConnectionError if the pool has not been connected yet.
   */
  GetPool(): sql.ConnectionPool {
    if (!this.pool?.connected) {
      throw new ConnectionError(
        'Connection pool is not connected. Call Connect() before accessing the pool.'
      );
    }
    return this.pool;
  }

  /**
   * Opens a session on the pool's single connection, connecting first if needed.
   */
  async OpenSession(): Promise<DatabaseSession> {
    await this.Connect();
    return new MssqlSession(this.GetPool());
  }

  /**
   * Closes the connection pool and releases all resources.
   * Safe to call multiple times.
   */
  async Disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = null;
    }
  }

  /**
   * Returns true if the connection pool is currently connected.
   */
  get IsConnected(): boolean {
    return this.pool?.connected ?? false;
  }
}
