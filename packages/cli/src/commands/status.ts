/**
 * @module commands/status
 * Implementation of the `sluice status` CLI command.
 */

import { Sluice, SluiceConfig } from '@sluice/core';
import { PrintStatusTable, LogInfo, LogError } from '../formatting';

/**
 * Executes the status command: shows whether each script's object exists.
 *
 * @param config - Resolved Sluice configuration
 */
export async function RunStatus(config: SluiceConfig): Promise<boolean> {
  const sluice = new Sluice(config);

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    console.log();

    const statuses = await sluice.Status();
    PrintStatusTable(statuses);

    const missing = statuses.filter((s) => s.State === 'missing' || s.State === 'kind-mismatch');
    const changed = statuses.filter((s) => s.ChecksumChanged === true);
    if (missing.length > 0) {
      LogInfo(`${missing.length} object(s) missing or of another kind`);
    }
    if (changed.length > 0) {
      LogInfo(`${changed.length} script(s) changed since last deployment`);
    }
    if (missing.length === 0 && changed.length === 0) {
      LogInfo('All objects are deployed');
    }

    console.log();
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await sluice.Close();
  }
}
