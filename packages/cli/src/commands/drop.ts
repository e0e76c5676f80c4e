/**
 * @module commands/drop
 * Implementation of the `sluice drop` CLI command.
 */

import { Sluice, SluiceConfig } from '@sluice/core';
import { LogInfo, LogSuccess, LogError } from '../formatting';

/**
 * Executes the drop command: drops every object the scripts define.
 *
 * @param config - Resolved Sluice configuration
 * @param signal - Aborted on Ctrl+C; no further objects are dropped
 */
export async function RunDrop(config: SluiceConfig, signal?: AbortSignal): Promise<boolean> {
  const sluice = new Sluice(config);
  sluice.OnProgress({ OnLog: LogInfo });

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    console.log();

    const result = await sluice.Drop(signal);

    if (result.Success) {
      LogSuccess(
        `Drop completed: ${result.Dropped.length} object(s) dropped, ${result.Skipped.length} already absent`
      );
    } else if (result.Cancelled) {
      LogError(`Drop cancelled after ${result.Dropped.length} object(s)`);
    } else {
      LogError(result.ErrorMessage ?? 'Drop failed');
    }

    console.log();
    return result.Success;
  } finally {
    await sluice.Close();
  }
}
