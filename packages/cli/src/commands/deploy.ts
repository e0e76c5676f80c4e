/**
 * @module commands/deploy
 * Implementation of the `sluice deploy` CLI command.
 */

import { ApplyResult, BatchOutput, Sluice, SluiceConfig } from '@sluice/core';
import {
  LogScriptStart,
  LogScriptEnd,
  LogInfo,
  PrintBatchOutput,
  PrintDeploySummary,
  PrintResultList,
} from '../formatting';

/**
 * Executes the deploy command: applies every script in deployment order.
 *
 * @param config - Resolved Sluice configuration
 * @param quiet - When true, suppress per-script output
 * @param signal - Aborted on Ctrl+C; the run stops after the batch in flight
 */
export async function RunDeploy(
  config: SluiceConfig,
  quiet: boolean = false,
  signal?: AbortSignal
): Promise<boolean> {
  const sluice = new Sluice(config);

  if (!quiet) {
    // The start line is still open while batches run, so output waits for the script's end
    let outputs: BatchOutput[] = [];
    sluice.OnProgress({
      OnScriptStart: LogScriptStart,
      OnScriptEnd: (result: ApplyResult) => {
        LogScriptEnd(result);
        outputs.forEach(PrintBatchOutput);
        outputs = [];
      },
      OnOutput: (_script, _batch, output) => outputs.push(output),
      OnLog: LogInfo,
    });
  } else {
    sluice.OnProgress({
      OnLog: LogInfo,
    });
  }

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    LogInfo(`Locations: ${config.Scripts.Locations.join(', ')}`);
    LogInfo(`Transaction mode: ${config.TransactionMode ?? 'per-script'}`);
    if (config.DryRun) {
      LogInfo('Mode: DRY RUN');
    }
    console.log();

    const result = await sluice.Deploy(signal);

    if (result.DryRun) {
      result.Plan.forEach((name, index) => LogInfo(`${index + 1}. ${name}`));
      console.log();
      return result.Success;
    }

    if (result.Run && !result.Run.Succeeded) {
      console.log();
      PrintResultList(result.Run.Results);
    }
    if (result.Run?.Cancelled) {
      LogInfo('Deployment cancelled');
    }

    PrintDeploySummary(
      result.ScriptsApplied,
      result.ScriptsFailed,
      result.ScriptsNotAttempted,
      result.TotalExecutionTimeMS,
      result.Success,
      result.ErrorMessage
    );

    return result.Success;
  } finally {
    await sluice.Close();
  }
}
