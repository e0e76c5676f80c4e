/**
 * @module scripts/types
 * Type definitions for object-definition scripts and the objects they target.
 */

/**
 * The kind of database object a script defines.
 */
export type ObjectKind = 'procedure' | 'view' | 'function' | 'trigger';

/**
 * Kinds reported by the catalog. Objects a script never defines
 * (tables, synonyms, constraints...) show up as `'table'` or `'other'`.
 */
export type CatalogKind = ObjectKind | 'table' | 'other';

/**
 * How identifier parts are compared. SQL Server databases are usually
 * installed with a case-insensitive collation, but not always.
 */
export type IdentifierCase = 'insensitive' | 'sensitive';

/**
 * Identity of a database object: schema, name and kind.
 * Used as the lookup key into the catalog.
 */
export interface ObjectRef {
  readonly Schema: string;
  readonly Name: string;
  readonly Kind: ObjectKind;
}

/**
 * An object-definition script. Immutable once loaded.
 */
export interface Script {
  /** Identity of the script, usually its path relative to the script root */
  readonly Name: string;

  /** Absolute path on disk, or null for scripts built in memory */
  readonly Path: string | null;

  /** Raw text lines in file order, without line terminators */
  readonly Lines: readonly string[];

  /** The object the script defines, when known */
  readonly Target: ObjectRef | null;

  /** Objects that must be deployed before this script */
  readonly DependsOn: readonly ObjectRef[];

  /** CRC32 checksum of the script text */
  readonly Checksum: number;
}
