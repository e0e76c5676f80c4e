/**
 * @module core/config
 * Sluice configuration types and defaults.
 */

import { DatabaseConfig } from '../db/types';
import { IdentifierCase, ObjectKind } from '../scripts/types';
import { DEFAULT_KIND_ORDER } from '../scripts/ordering';
import { DEFAULT_SEPARATOR } from '../executor/sql-splitter';
import type { TransactionMode } from '../executor/types';

export type { TransactionMode };

/**
 * Complete configuration for a Sluice deployment.
 */
export interface SluiceConfig {
  /** SQL Server connection settings */
  Database: DatabaseConfig;

  /** Script discovery and splitting settings */
  Scripts: ScriptConfig;

  /**
   * Placeholder key-value pairs for substitution in script SQL.
   *
   * Only placeholders registered here (or built-in `sluice:*` placeholders)
   * are substituted. All other `$(...)` and `${...}` patterns are left untouched.
   *
   * @example
   * ```typescript
   * { 'DB_NAME': 'my_app', 'appVersion': '3.0.0' }
   * ```
   */
  Placeholders?: Record<string, string>;

  /**
   * Transaction mode for script execution.
   * Defaults to `'per-script'`.
   */
  TransactionMode?: TransactionMode;

  /**
   * In `'per-script'` mode, stop at the first failed script.
   * Defaults to false: later scripts are still attempted.
   */
  StopOnFailure?: boolean;

  /**
   * Per-batch timeout in milliseconds. A batch that runs longer is
   * cancelled and its script fails. Defaults to null (no timeout beyond
   * the driver's request timeout).
   */
  BatchTimeoutMS?: number | null;

  /** Deployment history ledger settings */
  History?: HistoryConfig;

  /**
   * Report the result sets and messages each batch returns through the
   * `OnOutput` callback. Defaults to false.
   */
  DisplayOutput?: boolean;

  /**
   * When true, Deploy() reports the scripts it would apply without executing them.
   * Defaults to false.
   */
  DryRun?: boolean;
}

/**
 * Configuration for script discovery and execution behavior.
 */
export interface ScriptConfig {
  /**
   * Filesystem paths to scan recursively for scripts.
   *
   * @example `['./database']`
   */
  Locations: string[];

  /**
   * Batch separator token. Defaults to `'GO'`.
   */
  Separator?: string;

  /**
   * How object names are compared when matching `depends-on` directives
   * to script targets. Defaults to `'insensitive'`.
   */
  IdentifierCase?: IdentifierCase;

  /**
   * Deployment precedence by object kind.
   * Defaults to functions, views, procedures, triggers.
   */
  KindOrder?: ObjectKind[];
}

/**
 * Configuration for the deployment history table.
 */
export interface HistoryConfig {
  /** Record every run's results. Defaults to false */
  Enabled?: boolean;

  /** Schema of the history table. Defaults to `'dbo'` */
  Schema?: string;

  /** Name of the history table. Defaults to `'sluice_deploy_history'` */
  Table?: string;
}

export type ResolvedSluiceConfig = Required<SluiceConfig> & {
  Scripts: Required<ScriptConfig>;
  History: Required<HistoryConfig>;
};

/**
 * Merges user-provided config with sensible defaults.
 * @param config - Partial configuration provided by the user
 * @returns Complete configuration with all defaults applied
 */
export function resolveConfig(config: SluiceConfig): ResolvedSluiceConfig {
  return {
    Database: config.Database,
    Scripts: {
      Locations: config.Scripts.Locations,
      Separator: config.Scripts.Separator ?? DEFAULT_SEPARATOR,
      IdentifierCase: config.Scripts.IdentifierCase ?? 'insensitive',
      KindOrder: config.Scripts.KindOrder ?? DEFAULT_KIND_ORDER,
    },
    Placeholders: config.Placeholders ?? {},
    TransactionMode: config.TransactionMode ?? 'per-script',
    StopOnFailure: config.StopOnFailure ?? false,
    BatchTimeoutMS: config.BatchTimeoutMS ?? null,
    History: {
      Enabled: config.History?.Enabled ?? false,
      Schema: config.History?.Schema ?? 'dbo',
      Table: config.History?.Table ?? 'sluice_deploy_history',
    },
    DisplayOutput: config.DisplayOutput ?? false,
    DryRun: config.DryRun ?? false,
  };
}
