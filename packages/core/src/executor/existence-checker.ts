/**
 * @module executor/existence-checker
 * Catalog lookups for the objects scripts define.
 *
 * Every call issues exactly one catalog query. Results are never cached:
 * the catalog changes as scripts run, and a stale answer would report a
 * dropped object as present (or the reverse).
 */

import { CatalogEntry, DatabaseSession } from '../db/types';
import { ObjectRef } from '../scripts/types';
import { FormatObjectRef } from '../scripts/object-ref';
import { CatalogQueryError, ConnectionError, toError } from '../core/errors';

export class ObjectExistenceChecker {
  /**
   * Returns true if the object exists with the referenced kind.
   * An object of another kind under the same name does not count.
   *
   * @throws ConnectionError if the database is unreachable
   * @throws CatalogQueryError if the lookup fails for another reason
   */
  async Exists(ref: ObjectRef, session: DatabaseSession): Promise<boolean> {
    const entry = await this.Lookup(ref, session);
    return entry.Exists && entry.Kind === ref.Kind;
  }

  /**
   * Returns the catalog entry for the object's schema and name.
   *
   * @throws ConnectionError if the database is unreachable
   * @throws CatalogQueryError if the lookup fails for another reason
   */
  async Lookup(ref: ObjectRef, session: DatabaseSession): Promise<CatalogEntry> {
    try {
      return await session.QueryCatalog(ref);
    } catch (err) {
      if (err instanceof ConnectionError || err instanceof CatalogQueryError) {
        throw err;
      }
      const error = toError(err);
      const name = FormatObjectRef(ref);
      throw new CatalogQueryError(name, `Catalog lookup for ${name} failed: ${error.message}`, error);
    }
  }
}
