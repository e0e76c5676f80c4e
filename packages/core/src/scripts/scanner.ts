/**
 * @module scripts/scanner
 * Discovers object-definition scripts on disk by recursively scanning
 * configured script directories, and builds immutable `Script` values.
 *
 * Files are filtered to the `.sql` extension and parsed using the path
 * parser. Files that do not follow the naming convention are reported as
 * warnings and skipped; they do not halt the scan.
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import { ObjectRef, Script } from './types';
import { ParseDependencies, ParseScriptPath, ScriptLocation } from './parser';
import { ComputeChecksum } from './checksum';
import { ScriptParseError } from '../core/errors';

/**
 * Callback for reporting non-fatal scan issues (e.g., unparseable filenames).
 */
export type ScanWarningCallback = (message: string) => void;

/**
 * Input for {@link CreateScript}.
 */
export interface ScriptSource {
  Name: string;
  Text: string;
  Path?: string | null;
  Target?: ObjectRef | null;
  DependsOn?: ObjectRef[];
}

/**
 * Builds a frozen `Script` from in-memory text.
 * A leading UTF-8 BOM is dropped.
 *
 * @example
 * ```typescript
 * const script = CreateScript({
 *   Name: 'store.RaiseError.sql',
 *   Text: "CREATE PROCEDURE [store].[RaiseError] AS THROW 50001, 'Error', 1;",
 *   Target: { Schema: 'store', Name: 'RaiseError', Kind: 'procedure' },
 * });
 * ```
 */
export function CreateScript(source: ScriptSource): Script {
  const text = source.Text.charCodeAt(0) === 0xfeff ? source.Text.slice(1) : source.Text;
  const lines = Object.freeze(text.split(/\r\n|\r|\n/));

  return Object.freeze({
    Name: source.Name,
    Path: source.Path ?? null,
    Lines: lines,
    Target: source.Target ? Object.freeze({ ...source.Target }) : null,
    DependsOn: Object.freeze((source.DependsOn ?? []).map((ref) => Object.freeze({ ...ref }))),
    Checksum: ComputeChecksum(lines),
  });
}

/**
 * Returns a script's full text, lines joined with `\n`.
 */
export function ScriptText(script: Script): string {
  return script.Lines.join('\n');
}

/**
 * Recursively scans the given directories for `.sql` scripts and parses
 * their locations.
 *
 * @param locations - Directory paths to scan
 * @param onWarning - Optional callback for non-fatal warnings
 * @returns Parsed script locations, unsorted
 */
export async function ScanScripts(
  locations: string[],
  onWarning?: ScanWarningCallback
): Promise<ScriptLocation[]> {
  const results: ScriptLocation[] = [];

  for (const location of locations) {
    const resolvedLocation = path.resolve(location);

    if (!fs.existsSync(resolvedLocation)) {
      onWarning?.(`Script location does not exist: ${resolvedLocation}`);
      continue;
    }

    const sqlFiles = await fg('**/*.sql', {
      cwd: resolvedLocation,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
    });

    for (const filePath of sqlFiles) {
      try {
        results.push(ParseScriptPath(filePath, resolvedLocation));
      } catch (err) {
        if (!(err instanceof ScriptParseError)) {
          throw err;
        }
        onWarning?.(err.message);
      }
    }
  }

  return results;
}

/**
 * Reads a script file from disk and builds the `Script` value.
 *
 * @param location - Parsed script location
 * @returns Loaded, frozen script
 * @throws ScriptParseError if the file is UTF-16 encoded or has a bad directive
 */
export async function LoadScript(location: ScriptLocation): Promise<Script> {
  const buffer = await fs.promises.readFile(location.Path);

  if (hasUtf16ByteOrderMark(buffer)) {
    throw new ScriptParseError(
      path.basename(location.Path),
      `${location.Name} is UTF-16 encoded. Save it as UTF-8`
    );
  }

  const text = buffer.toString('utf-8');
  const lines = text.split(/\r\n|\r|\n/);

  return CreateScript({
    Name: location.Name,
    Path: location.Path,
    Text: text,
    Target: location.Target,
    DependsOn: ParseDependencies(lines, location.Name, location.Target.Kind),
  });
}

/**
 * Scans directories and loads every discovered script.
 * Convenience function combining {@link ScanScripts} and {@link LoadScript}.
 *
 * @param locations - Directory paths to scan
 * @param onWarning - Optional callback for non-fatal warnings
 * @returns Loaded scripts, unsorted
 */
export async function LoadScripts(
  locations: string[],
  onWarning?: ScanWarningCallback
): Promise<Script[]> {
  const scanned = await ScanScripts(locations, onWarning);
  return Promise.all(scanned.map(LoadScript));
}

function hasUtf16ByteOrderMark(buffer: Buffer): boolean {
  return (
    buffer.length >= 2 &&
    ((buffer[0] === 0xff && buffer[1] === 0xfe) || (buffer[0] === 0xfe && buffer[1] === 0xff))
  );
}
