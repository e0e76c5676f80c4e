/**
 * @module scripts/parser
 * Parses script paths and directive comments into structured metadata.
 *
 * Object-definition scripts follow a `schema.object.sql` naming
 * convention and live below a directory named after their kind:
 *
 * ```
 * database/
 *   functions/store.fnPrice.sql
 *   views/store.vwClients.sql
 *   procedures/store.RaiseError.sql
 *   triggers/store.trgAudit.sql
 * ```
 */

import * as path from 'path';
import { ObjectKind, ObjectRef } from './types';
import { ParseObjectRef } from './object-ref';
import { ScriptParseError } from '../core/errors';

/**
 * Directory names that identify a script's object kind.
 */
const KIND_DIRECTORIES: Record<string, ObjectKind> = {
  procedures: 'procedure',
  procedure: 'procedure',
  views: 'view',
  view: 'view',
  functions: 'function',
  function: 'function',
  triggers: 'trigger',
  trigger: 'trigger',
};

/**
 * `schema.object.sql`: exactly two dot-separated name parts.
 *
 * Groups:
 *  1. Schema name
 *  2. Object name
 */
const SCRIPT_FILENAME_PATTERN = /^([^.\s]+)\.([^.\s]+)\.sql$/i;

/**
 * `-- sluice:depends-on store.fnPrice, store.vwClients`
 */
const DEPENDS_ON_PATTERN = /^\s*--\s*sluice:depends-on\s+(.+?)\s*$/i;

/**
 * Metadata parsed from a script's location.
 */
export interface ScriptLocation {
  /** Path relative to the script root, with forward slashes */
  Name: string;

  /** Absolute path on disk */
  Path: string;

  /** The object the script defines */
  Target: ObjectRef;
}

/**
 * Parses a script path into its name and target object.
 *
 * @param filePath - Absolute path to the script file
 * @param scriptRoot - Root directory of the script location
 * @returns Parsed location
 * @throws ScriptParseError if the filename or directory does not follow the convention
 *
 * @example
 * ```typescript
 * const location = ParseScriptPath(
 *   '/repo/database/procedures/store.RaiseError.sql',
 *   '/repo/database'
 * );
 * // location.Name === 'procedures/store.RaiseError.sql'
 * // location.Target === { Schema: 'store', Name: 'RaiseError', Kind: 'procedure' }
 * ```
 */
export function ParseScriptPath(filePath: string, scriptRoot: string): ScriptLocation {
  const filename = path.basename(filePath);
  const match = filename.match(SCRIPT_FILENAME_PATTERN);

  if (!match) {
    throw new ScriptParseError(
      filename,
      `Cannot parse script filename "${filename}". Expected format: <schema>.<object>.sql`
    );
  }

  const kind = resolveKind(filePath, scriptRoot);
  if (!kind) {
    throw new ScriptParseError(
      filename,
      `Cannot determine the object kind of "${filename}". Place it below a ` +
        `procedures, views, functions or triggers directory`
    );
  }

  return {
    Name: computeScriptName(filePath, scriptRoot),
    Path: filePath,
    Target: { Schema: match[1], Name: match[2], Kind: kind },
  };
}

/**
 * Reads `sluice:depends-on` directives from a script's lines.
 * Directives may appear anywhere; each lists one or more qualified names.
 * Dependencies are matched by name, so their kind is recorded as the
 * depending script's own kind.
 *
 * @throws ScriptParseError if a listed name cannot be parsed
 */
export function ParseDependencies(
  lines: readonly string[],
  filename: string,
  kind: ObjectKind
): ObjectRef[] {
  const dependencies: ObjectRef[] = [];

  for (const line of lines) {
    const match = line.match(DEPENDS_ON_PATTERN);
    if (!match) continue;

    for (const entry of match[1].split(',')) {
      const ref = ParseObjectRef(entry, kind);
      if (!ref) {
        throw new ScriptParseError(
          filename,
          `Invalid dependency "${entry.trim()}" in ${filename}`
        );
      }
      dependencies.push(ref);
    }
  }

  return dependencies;
}

/**
 * Finds the nearest directory between the file and the root whose name
 * identifies an object kind.
 */
function resolveKind(filePath: string, scriptRoot: string): ObjectKind | null {
  const segments = path.relative(scriptRoot, path.dirname(filePath)).split(/[\\/]/);

  for (let i = segments.length - 1; i >= 0; i--) {
    const kind = KIND_DIRECTORIES[segments[i].toLowerCase()];
    if (kind) {
      return kind;
    }
  }

  return null;
}

/**
 * Computes the script name relative to the script root.
 * Uses forward slashes for consistency across platforms.
 */
function computeScriptName(filePath: string, scriptRoot: string): string {
  return path.relative(scriptRoot, filePath).replace(/\\/g, '/');
}
