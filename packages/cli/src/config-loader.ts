/**
 * @module config-loader
 * Loads Sluice configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (`SLUICE_*`, then `DB_*`)
 * 3. Config file (sluice.json or sluice.config.json)
 * 4. .env file (via dotenv)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { DEFAULT_KIND_ORDER, IdentifierCase, ObjectKind, SluiceConfig, TransactionMode } from '@sluice/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['sluice.json', 'sluice.config.json'];

const TRANSACTION_MODES: readonly TransactionMode[] = ['per-script', 'all-or-nothing'];
const IDENTIFIER_CASES: readonly IdentifierCase[] = ['insensitive', 'sensitive'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Database server hostname */
  Server?: string;

  /** Database server port */
  Port?: number;

  /** Database name */
  Database?: string;

  /** Database user */
  User?: string;

  /** Database password */
  Password?: string;

  /** Script locations (comma-separated paths) */
  Locations?: string;

  /** Batch separator token */
  Separator?: string;

  /** Transaction mode */
  TransactionMode?: string;

  /** Stop at the first failed script in per-script mode */
  StopOnFailure?: boolean;

  /** Per-batch timeout in milliseconds */
  BatchTimeout?: number;

  /** Record runs in the history table */
  History?: boolean;

  /** History table schema */
  HistorySchema?: string;

  /** History table name */
  HistoryTable?: string;

  /** Trust server certificate */
  TrustServerCertificate?: boolean;

  /** Path to config file */
  Config?: string;

  /** Placeholders in key=value format */
  Placeholders?: string[];

  /** Print each batch's result sets and messages */
  DisplayOutput?: boolean;

  /** Dry-run mode */
  DryRun?: boolean;
}

/**
 * The subset of a config file Sluice reads, after key normalization and validation.
 */
export interface FileConfig {
  Database?: {
    Server?: string;
    Port?: number;
    Database?: string;
    User?: string;
    Password?: string;
    Options?: {
      Encrypt?: boolean;
      TrustServerCertificate?: boolean;
      RequestTimeout?: number;
      ConnectionTimeout?: number;
    };
  };
  Scripts?: {
    Locations?: string[];
    Separator?: string;
    IdentifierCase?: IdentifierCase;
    KindOrder?: ObjectKind[];
  };
  History?: {
    Enabled?: boolean;
    Schema?: string;
    Table?: string;
  };
  Placeholders?: Record<string, string>;
  TransactionMode?: TransactionMode;
  StopOnFailure?: boolean;
  BatchTimeoutMS?: number;
  DisplayOutput?: boolean;
  DryRun?: boolean;
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file and .env discovery
 * @param env - Process environment to read
 * @returns Merged SluiceConfig
 * @throws Error if required configuration is missing or a value is invalid
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): SluiceConfig {
  const dotenvVars = loadDotenv(cwd);
  const fileConfig = loadConfigFile(cliOptions.Config, cwd);

  const server = cliOptions.Server
    ?? readVar(env, 'SLUICE_SERVER', 'DB_HOST')
    ?? fileConfig?.Database?.Server
    ?? readVar(dotenvVars, 'SLUICE_SERVER', 'DB_HOST')
    ?? 'localhost';

  const port = cliOptions.Port
    ?? parseInteger(readVar(env, 'SLUICE_PORT', 'DB_PORT'), 'SLUICE_PORT')
    ?? fileConfig?.Database?.Port
    ?? parseInteger(readVar(dotenvVars, 'SLUICE_PORT', 'DB_PORT'), 'SLUICE_PORT')
    ?? 1433;

  const database = cliOptions.Database
    ?? readVar(env, 'SLUICE_DATABASE', 'DB_DATABASE')
    ?? fileConfig?.Database?.Database
    ?? readVar(dotenvVars, 'SLUICE_DATABASE', 'DB_DATABASE');

  const user = cliOptions.User
    ?? readVar(env, 'SLUICE_USER', 'DB_USER')
    ?? fileConfig?.Database?.User
    ?? readVar(dotenvVars, 'SLUICE_USER', 'DB_USER');

  const password = cliOptions.Password
    ?? readVar(env, 'SLUICE_PASSWORD', 'DB_PASSWORD')
    ?? fileConfig?.Database?.Password
    ?? readVar(dotenvVars, 'SLUICE_PASSWORD', 'DB_PASSWORD');

  if (!database) {
    throw new Error('Database name is required. Set via --database, SLUICE_DATABASE env var, or config file.');
  }
  if (!user) {
    throw new Error('Database user is required. Set via --user, SLUICE_USER env var, or config file.');
  }
  if (!password) {
    throw new Error('Database password is required. Set via --password, SLUICE_PASSWORD env var, or config file.');
  }

  const locationList = cliOptions.Locations ?? readVar(env, 'SLUICE_LOCATIONS');
  const locations = locationList
    ? splitList(locationList)
    : fileConfig?.Scripts?.Locations
      ?? splitList(readVar(dotenvVars, 'SLUICE_LOCATIONS') ?? './database');

  const transactionMode = parseTransactionMode(
    cliOptions.TransactionMode
      ?? readVar(env, 'SLUICE_TRANSACTION_MODE')
      ?? fileConfig?.TransactionMode
      ?? readVar(dotenvVars, 'SLUICE_TRANSACTION_MODE')
      ?? 'per-script'
  );

  const placeholders: Record<string, string> = { ...fileConfig?.Placeholders };
  for (const entry of cliOptions.Placeholders ?? []) {
    const eqIdx = entry.indexOf('=');
    if (eqIdx <= 0) {
      throw new Error(`Invalid placeholder "${entry}": expected key=value`);
    }
    placeholders[entry.substring(0, eqIdx)] = entry.substring(eqIdx + 1);
  }

  return {
    Database: {
      Server: server,
      Port: port,
      Database: database,
      User: user,
      Password: password,
      Options: {
        TrustServerCertificate: cliOptions.TrustServerCertificate
          ?? fileConfig?.Database?.Options?.TrustServerCertificate
          ?? true,
        Encrypt: fileConfig?.Database?.Options?.Encrypt ?? false,
        RequestTimeout: fileConfig?.Database?.Options?.RequestTimeout ?? 300_000,
        ConnectionTimeout: fileConfig?.Database?.Options?.ConnectionTimeout ?? 30_000,
      },
    },
    Scripts: {
      Locations: locations,
      Separator: cliOptions.Separator ?? fileConfig?.Scripts?.Separator ?? 'GO',
      IdentifierCase: fileConfig?.Scripts?.IdentifierCase ?? 'insensitive',
      KindOrder: fileConfig?.Scripts?.KindOrder ?? DEFAULT_KIND_ORDER,
    },
    History: {
      Enabled: cliOptions.History
        ?? parseBoolean(readVar(env, 'SLUICE_HISTORY'))
        ?? fileConfig?.History?.Enabled
        ?? parseBoolean(readVar(dotenvVars, 'SLUICE_HISTORY'))
        ?? false,
      Schema: cliOptions.HistorySchema ?? fileConfig?.History?.Schema ?? 'dbo',
      Table: cliOptions.HistoryTable ?? fileConfig?.History?.Table ?? 'sluice_deploy_history',
    },
    Placeholders: placeholders,
    TransactionMode: transactionMode,
    StopOnFailure: cliOptions.StopOnFailure ?? fileConfig?.StopOnFailure ?? false,
    BatchTimeoutMS: cliOptions.BatchTimeout
      ?? parseInteger(readVar(env, 'SLUICE_BATCH_TIMEOUT'), 'SLUICE_BATCH_TIMEOUT')
      ?? fileConfig?.BatchTimeoutMS
      ?? parseInteger(readVar(dotenvVars, 'SLUICE_BATCH_TIMEOUT'), 'SLUICE_BATCH_TIMEOUT')
      ?? null,
    DisplayOutput: cliOptions.DisplayOutput ?? fileConfig?.DisplayOutput ?? false,
    DryRun: cliOptions.DryRun ?? fileConfig?.DryRun ?? false,
  };
}

/**
 * Reads `.env` from the working directory without touching `process.env`.
 */
function loadDotenv(cwd: string): Record<string, string> {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath));
}

/**
 * First non-empty value among the named variables.
 */
function readVar(source: Record<string, string | undefined>, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = source[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new Error(`Config file not found: ${fullPath}`);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Reads, normalizes and validates a JSON config file.
 */
function loadFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot read config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return ParseFileConfig(normalizeConfigKeys(raw), filePath);
}

/**
 * Validates a normalized config object.
 *
 * @throws Error naming the offending key when a value has the wrong type
 */
export function ParseFileConfig(raw: unknown, source: string): FileConfig {
  const root = expectRecord(raw, source, '(root)');
  const config: FileConfig = {};

  if (root.Database !== undefined) {
    const db = expectRecord(root.Database, source, 'Database');
    const options = db.Options === undefined ? undefined : expectRecord(db.Options, source, 'Database.Options');
    config.Database = {
      Server: optionalString(db.Server, source, 'Database.Server'),
      Port: optionalNumber(db.Port, source, 'Database.Port'),
      Database: optionalString(db.Database, source, 'Database.Database'),
      User: optionalString(db.User, source, 'Database.User'),
      Password: optionalString(db.Password, source, 'Database.Password'),
      Options: options && {
        Encrypt: optionalBoolean(options.Encrypt, source, 'Database.Options.Encrypt'),
        TrustServerCertificate: optionalBoolean(
          options.TrustServerCertificate,
          source,
          'Database.Options.TrustServerCertificate'
        ),
        RequestTimeout: optionalNumber(options.RequestTimeout, source, 'Database.Options.RequestTimeout'),
        ConnectionTimeout: optionalNumber(options.ConnectionTimeout, source, 'Database.Options.ConnectionTimeout'),
      },
    };
  }

  if (root.Scripts !== undefined) {
    const scripts = expectRecord(root.Scripts, source, 'Scripts');
    const kindOrder = optionalStringArray(scripts.KindOrder, source, 'Scripts.KindOrder');
    const identifierCase = optionalString(scripts.IdentifierCase, source, 'Scripts.IdentifierCase');
    config.Scripts = {
      Locations: optionalStringArray(scripts.Locations, source, 'Scripts.Locations'),
      Separator: optionalString(scripts.Separator, source, 'Scripts.Separator'),
      IdentifierCase:
        identifierCase === undefined
          ? undefined
          : oneOf(identifierCase, IDENTIFIER_CASES, source, 'Scripts.IdentifierCase'),
      KindOrder: kindOrder?.map((kind) => oneOf(kind, DEFAULT_KIND_ORDER, source, 'Scripts.KindOrder')),
    };
  }

  if (root.History !== undefined) {
    const history = expectRecord(root.History, source, 'History');
    config.History = {
      Enabled: optionalBoolean(history.Enabled, source, 'History.Enabled'),
      Schema: optionalString(history.Schema, source, 'History.Schema'),
      Table: optionalString(history.Table, source, 'History.Table'),
    };
  }

  if (root.Placeholders !== undefined) {
    const placeholders = expectRecord(root.Placeholders, source, 'Placeholders');
    config.Placeholders = {};
    for (const [key, value] of Object.entries(placeholders)) {
      if (typeof value !== 'string') {
        throw new Error(`${source}: Placeholders.${key} must be a string`);
      }
      config.Placeholders[key] = value;
    }
  }

  const transactionMode = optionalString(root.TransactionMode, source, 'TransactionMode');
  if (transactionMode !== undefined) {
    config.TransactionMode = oneOf(transactionMode, TRANSACTION_MODES, source, 'TransactionMode');
  }
  config.StopOnFailure = optionalBoolean(root.StopOnFailure, source, 'StopOnFailure');
  config.BatchTimeoutMS = optionalNumber(root.BatchTimeoutMS, source, 'BatchTimeoutMS');
  config.DisplayOutput = optionalBoolean(root.DisplayOutput, source, 'DisplayOutput');
  config.DryRun = optionalBoolean(root.DryRun, source, 'DryRun');

  return config;
}

/**
 * Known config key mappings from camelCase to PascalCase.
 * Supports both casings in JSON config files.
 */
const KEY_MAP: Record<string, string> = {
  database: 'Database',
  server: 'Server',
  port: 'Port',
  user: 'User',
  password: 'Password',
  options: 'Options',
  encrypt: 'Encrypt',
  trustServerCertificate: 'TrustServerCertificate',
  requestTimeout: 'RequestTimeout',
  connectionTimeout: 'ConnectionTimeout',
  scripts: 'Scripts',
  locations: 'Locations',
  separator: 'Separator',
  identifierCase: 'IdentifierCase',
  kindOrder: 'KindOrder',
  history: 'History',
  enabled: 'Enabled',
  schema: 'Schema',
  table: 'Table',
  placeholders: 'Placeholders',
  transactionMode: 'TransactionMode',
  stopOnFailure: 'StopOnFailure',
  batchTimeoutMS: 'BatchTimeoutMS',
  displayOutput: 'DisplayOutput',
  dryRun: 'DryRun',
};

/**
 * Recursively normalizes config object keys from camelCase to PascalCase.
 * Keys already in PascalCase are left unchanged. Unknown keys are preserved as-is;
 * placeholder names are user-defined and never renamed.
 */
export function normalizeConfigKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeConfigKeys);
  }
  if (!isRecord(value)) {
    return value;
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const mappedKey = KEY_MAP[key] ?? key;
    normalized[mappedKey] = mappedKey === 'Placeholders' ? entry : normalizeConfigKeys(entry);
  }
  return normalized;
}

/**
 * Parses a transaction mode name.
 * @throws Error for anything other than `per-script` or `all-or-nothing`
 */
export function parseTransactionMode(value: string): TransactionMode {
  const mode = TRANSACTION_MODES.find((m) => m === value);
  if (!mode) {
    throw new Error(`Invalid transaction mode "${value}". Expected one of: ${TRANSACTION_MODES.join(', ')}`);
  }
  return mode;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, source: string, key: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${source}: ${key} must be an object`);
  }
  return value;
}

function optionalString(value: unknown, source: string, key: string): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new Error(`${source}: ${key} must be a string`);
}

function optionalNumber(value: unknown, source: string, key: string): number | undefined {
  if (value === undefined || typeof value === 'number') {
    return value;
  }
  throw new Error(`${source}: ${key} must be a number`);
}

function optionalBoolean(value: unknown, source: string, key: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new Error(`${source}: ${key} must be a boolean`);
}

function optionalStringArray(value: unknown, source: string, key: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new Error(`${source}: ${key} must be an array of strings`);
}

function oneOf<T extends string>(value: string, allowed: readonly T[], source: string, key: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${source}: ${key} must be one of ${allowed.join(', ')}, got "${value}"`);
  }
  return match;
}
