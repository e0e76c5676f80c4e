/**
 * @module scripts/object-ref
 * Parsing, formatting and comparison of object references.
 *
 * Comparison is driven by an explicit `IdentifierCase` instead of assuming
 * the server's collation.
 */

import { IdentifierCase, ObjectKind, ObjectRef } from './types';

/**
 * A schema-qualified name such as `store.RaiseError`, `[store].[RaiseError]`
 * or a bare `RaiseError`. Bracketed parts may contain dots.
 */
const QUALIFIED_NAME_PATTERN = /^\s*(?:(\[[^\]]+\]|[^.\[\]\s]+)\.)?(\[[^\]]+\]|[^.\[\]\s]+)\s*$/;

/**
 * Parses a schema-qualified name into an object reference.
 *
 * @param text - Qualified name, optionally bracket-quoted
 * @param kind - Kind of the referenced object
 * @param defaultSchema - Schema used when the name is not qualified
 * @returns The parsed reference, or null if the text is not a valid name
 *
 * @example
 * ```typescript
 * ParseObjectRef('[store].[RaiseError]', 'procedure');
 * // { Schema: 'store', Name: 'RaiseError', Kind: 'procedure' }
 * ```
 */
export function ParseObjectRef(
  text: string,
  kind: ObjectKind,
  defaultSchema: string = 'dbo'
): ObjectRef | null {
  const match = text.match(QUALIFIED_NAME_PATTERN);
  if (!match) {
    return null;
  }

  return {
    Schema: match[1] ? unquote(match[1]) : defaultSchema,
    Name: unquote(match[2]),
    Kind: kind,
  };
}

/**
 * Formats a reference as `schema.name`.
 */
export function FormatObjectRef(ref: ObjectRef): string {
  return `${ref.Schema}.${ref.Name}`;
}

/**
 * Returns true if both references name the same object.
 * Kinds must match exactly; identifier parts follow `identifierCase`.
 */
export function ObjectRefsEqual(
  a: ObjectRef,
  b: ObjectRef,
  identifierCase: IdentifierCase = 'insensitive'
): boolean {
  return a.Kind === b.Kind && NamesEqual(a, b, identifierCase);
}

/**
 * Returns true if both references have the same schema and name, whatever their kind.
 * SQL Server keeps procedures, views, functions and tables in one namespace per schema.
 */
export function NamesEqual(
  a: ObjectRef,
  b: ObjectRef,
  identifierCase: IdentifierCase = 'insensitive'
): boolean {
  return ObjectNameKey(a, identifierCase) === ObjectNameKey(b, identifierCase);
}

/**
 * Builds a map key for a reference's schema and name.
 * Two references with equal names under `identifierCase` produce equal keys.
 */
export function ObjectNameKey(
  ref: ObjectRef,
  identifierCase: IdentifierCase = 'insensitive'
): string {
  const key = `${ref.Schema}\u0000${ref.Name}`;
  return identifierCase === 'insensitive' ? key.toLowerCase() : key;
}

function unquote(part: string): string {
  return part.startsWith('[') && part.endsWith(']') ? part.slice(1, -1) : part;
}
