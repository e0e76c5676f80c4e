/**
 * @module executor/placeholder
 * Placeholder substitution for script SQL.
 *
 * Two syntaxes are recognised: sqlcmd scripting variables `$(name)` and
 * `${name}`. Only *known* names are substituted:
 *
 * 1. Built-in `sluice:*` placeholders (database, user, timestamp, ...)
 * 2. Explicitly registered user placeholders from the config
 *
 * Every other `$(...)` or `${...}` is left untouched, so JSON or
 * JavaScript embedded in string literals survives deployment.
 */

import { ObjectRef } from '../scripts/types';

/**
 * Runtime context for resolving built-in placeholders.
 */
export interface PlaceholderContext {
  /** Current timestamp string for `sluice:timestamp` */
  Timestamp: string;

  /** Database name for `sluice:database` */
  Database?: string;

  /** Connected user for `sluice:user` */
  User?: string;

  /** Current script name for `sluice:filename` */
  Filename?: string;

  /** Object the current script defines, for `sluice:schema` and `sluice:object` */
  Target?: ObjectRef | null;
}

/**
 * Substitutes known placeholders in script content.
 *
 * @param sql - Raw SQL content with placeholder tokens
 * @param placeholders - Map of placeholder name → replacement value
 * @param context - Runtime context for resolving built-in placeholders
 * @returns SQL with known placeholders replaced
 *
 * @example
 * ```typescript
 * const result = SubstitutePlaceholders(
 *   'SELECT * FROM [$(sluice:schema)].[Clients]',
 *   {},
 *   { Timestamp: new Date().toISOString(), Target: { Schema: 'store', Name: 'vwClients', Kind: 'view' } }
 * );
 * // result === 'SELECT * FROM [store].[Clients]'
 * ```
 */
export function SubstitutePlaceholders(
  sql: string,
  placeholders: Record<string, string>,
  context: PlaceholderContext
): string {
  const resolvedMap = buildPlaceholderMap(placeholders, context);

  // $(name) or ${name}; the name may contain letters, digits, colons, underscores, dots
  return sql.replace(
    /\$\(([^()\s]+)\)|\$\{([^}\s]+)\}/g,
    (fullMatch, sqlcmdName: string | undefined, braceName: string | undefined) => {
      const name = sqlcmdName ?? braceName ?? '';
      const value = resolvedMap.get(name);
      return value ?? fullMatch;
    }
  );
}

/**
 * Builds the complete placeholder map by merging built-ins with
 * user-defined placeholders. User values win on a name conflict.
 */
function buildPlaceholderMap(
  userPlaceholders: Record<string, string>,
  context: PlaceholderContext
): Map<string, string> {
  const map = new Map<string, string>();

  map.set('sluice:timestamp', context.Timestamp);

  if (context.Database) {
    map.set('sluice:database', context.Database);
  }
  if (context.User) {
    map.set('sluice:user', context.User);
  }
  if (context.Filename) {
    map.set('sluice:filename', context.Filename);
  }
  if (context.Target) {
    map.set('sluice:schema', context.Target.Schema);
    map.set('sluice:object', context.Target.Name);
  }

  for (const [key, value] of Object.entries(userPlaceholders)) {
    map.set(key, value);
  }

  return map;
}
