/**
 * @module db/mssql-dialect
 * T-SQL specifics: identifier quoting, catalog type codes, drop statements
 * and the session defaults restored between scripts.
 */

import { CatalogKind, ObjectKind, ObjectRef } from '../scripts/types';

/**
 * `sys.objects.type` codes mapped to catalog kinds.
 */
const CATALOG_TYPE_KINDS: Record<string, CatalogKind> = {
  P: 'procedure',
  PC: 'procedure',
  X: 'procedure',
  V: 'view',
  FN: 'function',
  IF: 'function',
  TF: 'function',
  FS: 'function',
  FT: 'function',
  AF: 'function',
  TR: 'trigger',
  TA: 'trigger',
  U: 'table',
};

const DROP_KEYWORDS: Record<ObjectKind, string> = {
  procedure: 'PROCEDURE',
  view: 'VIEW',
  function: 'FUNCTION',
  trigger: 'TRIGGER',
};

/**
 * Connection defaults of the tedious driver. Re-issued before each script
 * so a `SET` in one script never changes how the next one compiles.
 */
export const SESSION_RESET_SQL = [
  'SET ANSI_NULLS ON;',
  'SET ANSI_NULL_DFLT_ON ON;',
  'SET ANSI_PADDING ON;',
  'SET ANSI_WARNINGS ON;',
  'SET ARITHABORT ON;',
  'SET CONCAT_NULL_YIELDS_NULL ON;',
  'SET CURSOR_CLOSE_ON_COMMIT OFF;',
  'SET IMPLICIT_TRANSACTIONS OFF;',
  'SET NOCOUNT OFF;',
  'SET NUMERIC_ROUNDABORT OFF;',
  'SET QUOTED_IDENTIFIER ON;',
  'SET XACT_ABORT OFF;',
  'SET TEXTSIZE 2147483647;',
  'SET DATEFIRST 7;',
  'SET DATEFORMAT mdy;',
  'SET LANGUAGE us_english;',
].join('\n');

/**
 * Maps a `sys.objects.type` code to a catalog kind.
 */
export function MapCatalogType(typeCode: string): CatalogKind {
  return CATALOG_TYPE_KINDS[typeCode.trim().toUpperCase()] ?? 'other';
}

/**
 * Quotes an identifier part with brackets, escaping closing brackets.
 *
 * @example
 * ```typescript
 * QuoteIdentifier('odd]name'); // '[odd]]name]'
 * ```
 */
export function QuoteIdentifier(part: string): string {
  return `[${part.replace(/]/g, ']]')}]`;
}

/**
 * Formats a reference as a bracket-quoted two-part name.
 */
export function QuoteObjectRef(ref: ObjectRef): string {
  return `${QuoteIdentifier(ref.Schema)}.${QuoteIdentifier(ref.Name)}`;
}

/**
 * Builds the `DROP` statement for the object a script defines.
 *
 * @example
 * ```typescript
 * FormatDropStatement({ Schema: 'store', Name: 'RaiseError', Kind: 'procedure' });
 * // 'DROP PROCEDURE [store].[RaiseError]'
 * ```
 */
export function FormatDropStatement(ref: ObjectRef): string {
  return `DROP ${DROP_KEYWORDS[ref.Kind]} ${QuoteObjectRef(ref)}`;
}
