/**
 * @module commands/history
 * Implementation of the `sluice history` CLI command.
 */

import { Sluice, SluiceConfig } from '@sluice/core';
import { PrintHistoryTable, LogInfo, LogError } from '../formatting';

/**
 * Executes the history command: lists recorded deployments.
 *
 * @param config - Resolved Sluice configuration
 */
export async function RunHistory(config: SluiceConfig): Promise<boolean> {
  const sluice = new Sluice(config);

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    console.log();

    PrintHistoryTable(await sluice.History());
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await sluice.Close();
  }
}
