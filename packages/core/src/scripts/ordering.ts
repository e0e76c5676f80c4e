/**
 * @module scripts/ordering
 * Puts loaded scripts into deployment order.
 *
 * Base order is by object kind (functions before the views that call them,
 * views before procedures, triggers last) and then by script name.
 * `sluice:depends-on` directives then pull dependencies ahead of the
 * scripts that need them. Among scripts that are free to run, the base
 * order decides, so the result is deterministic.
 */

import { IdentifierCase, ObjectKind, Script } from './types';
import { ObjectNameKey } from './object-ref';
import { ScriptOrderError } from '../core/errors';

export const DEFAULT_KIND_ORDER: ObjectKind[] = ['function', 'view', 'procedure', 'trigger'];

/**
 * Options for {@link OrderScripts}.
 */
export interface OrderOptions {
  /** Kind precedence. Kinds not listed go last. Defaults to {@link DEFAULT_KIND_ORDER} */
  KindOrder?: ObjectKind[];

  /** How dependency names are matched against script targets */
  IdentifierCase?: IdentifierCase;
}

/**
 * Orders scripts for deployment.
 *
 * Dependencies naming objects that no script in the set defines are
 * ignored; they are assumed to exist already.
 *
 * @param scripts - Scripts in any order
 * @param options - Kind precedence and identifier comparison
 * @returns A new array in deployment order
 * @throws ScriptOrderError if dependency directives form a cycle
 */
export function OrderScripts(scripts: readonly Script[], options: OrderOptions = {}): Script[] {
  const kindOrder = options.KindOrder ?? DEFAULT_KIND_ORDER;
  const identifierCase = options.IdentifierCase ?? 'insensitive';

  const base = [...scripts].sort((a, b) => {
    const rankDiff = kindRank(a, kindOrder) - kindRank(b, kindOrder);
    if (rankDiff !== 0) {
      return rankDiff;
    }
    return a.Name < b.Name ? -1 : a.Name > b.Name ? 1 : 0;
  });

  // Which scripts define each object name
  const definers = new Map<string, Script[]>();
  for (const script of base) {
    if (!script.Target) continue;
    const key = ObjectNameKey(script.Target, identifierCase);
    definers.set(key, [...(definers.get(key) ?? []), script]);
  }

  const prerequisites = new Map<Script, Set<Script>>();
  for (const script of base) {
    const required = new Set<Script>();
    for (const dependency of script.DependsOn) {
      for (const definer of definers.get(ObjectNameKey(dependency, identifierCase)) ?? []) {
        if (definer !== script) {
          required.add(definer);
        }
      }
    }
    prerequisites.set(script, required);
  }

  const ordered: Script[] = [];
  const placed = new Set<Script>();
  let remaining = base;

  while (remaining.length > 0) {
    const next = remaining.find((script) =>
      [...(prerequisites.get(script) ?? [])].every((required) => placed.has(required))
    );

    if (!next) {
      throw new ScriptOrderError(remaining.map((s) => s.Name));
    }

    ordered.push(next);
    placed.add(next);
    remaining = remaining.filter((script) => script !== next);
  }

  return ordered;
}

function kindRank(script: Script, kindOrder: ObjectKind[]): number {
  if (!script.Target) {
    return kindOrder.length;
  }
  const index = kindOrder.indexOf(script.Target.Kind);
  return index === -1 ? kindOrder.length : index;
}
