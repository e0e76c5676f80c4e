#!/usr/bin/env node
/**
 * @module bin/sluice
 * CLI entry point for Sluice.
 *
 * Usage:
 *   sluice deploy [options]
 *   sluice status [options]
 *   sluice drop --yes [options]
 *   sluice history [options]
 */

import { Command, InvalidArgumentError, OptionValues } from 'commander';
import { LoadConfig, CLIOptions } from '../config-loader';
import { PrintBanner, LogInfo, LogError } from '../formatting';
import { RunDeploy } from '../commands/deploy';
import { RunStatus } from '../commands/status';
import { RunDrop } from '../commands/drop';
import { RunHistory } from '../commands/history';
import { SluiceConfig } from '@sluice/core';

const program = new Command();

program
  .name('sluice')
  .description('Sluice — idempotent SQL Server object deployments')
  .version('0.1.0');

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option('-s, --server <host>', 'SQL Server hostname')
    .option('-p, --port <port>', 'SQL Server port', parseInteger)
    .option('-d, --database <name>', 'Database name')
    .option('-u, --user <user>', 'Database user')
    .option('-P, --password <password>', 'Database password')
    .option('-l, --locations <paths>', 'Script locations (comma-separated)')
    .option('--separator <token>', 'Batch separator token (default: GO)')
    .option('--history', 'Record deployments in the history table')
    .option('--history-schema <schema>', 'History table schema')
    .option('--history-table <table>', 'History table name')
    .option('--trust-server-certificate', 'Trust self-signed certificates')
    .option('--config <path>', 'Path to config file')
    .option('--placeholder <key=value>', 'Set a placeholder (repeatable)', collect, []);
}

// ─── Commands ───────────────────────────────────────────────────────

addSharedOptions(
  program
    .command('deploy')
    .description('Apply every script to the database')
)
  .option('--transaction-mode <mode>', 'Transaction mode: per-script or all-or-nothing')
  .option('--stop-on-failure', 'Stop at the first failed script (per-script mode)')
  .option('--batch-timeout <ms>', 'Cancel any batch running longer than this', parseInteger)
  .option('--display-output', 'Print the result sets and messages each batch returns')
  .option('--dry-run', 'Show the deployment order without executing anything')
  .option('-q, --quiet', 'Suppress per-script output, show summary only')
  .action(async (opts: OptionValues) => {
    PrintBanner();
    const config = loadConfigOrExit(opts);
    const controller = cancelOnInterrupt();
    const success = await RunDeploy(config, opts.quiet === true, controller.signal);
    process.exit(success ? 0 : 1);
  });

addSharedOptions(
  program
    .command('status')
    .description('Show whether each script\'s object exists and has changed')
).action(async (opts: OptionValues) => {
  PrintBanner();
  const config = loadConfigOrExit(opts);
  const success = await RunStatus(config);
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('drop')
    .description('Drop every object the scripts define (DESTRUCTIVE!)')
)
  .option('--yes', 'Confirm the drop')
  .action(async (opts: OptionValues) => {
    PrintBanner();
    if (opts.yes !== true) {
      LogError('Refusing to drop objects without --yes');
      process.exit(1);
    }
    const config = loadConfigOrExit(opts);
    const controller = cancelOnInterrupt();
    const success = await RunDrop(config, controller.signal);
    process.exit(success ? 0 : 1);
  });

addSharedOptions(
  program
    .command('history')
    .description('List recorded deployments')
).action(async (opts: OptionValues) => {
  PrintBanner();
  const config = loadConfigOrExit(opts);
  const success = await RunHistory(config);
  process.exit(success ? 0 : 1);
});

// ─── Helpers ────────────────────────────────────────────────────────

function loadConfigOrExit(opts: OptionValues): SluiceConfig {
  try {
    return LoadConfig(mapOptions(opts));
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

/**
 * The first Ctrl+C cancels after the batch in flight; a second one exits.
 */
function cancelOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    LogInfo('Cancelling after the current batch... (Ctrl+C again to exit now)');
    controller.abort();
  });
  return controller;
}

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: OptionValues): CLIOptions {
  return {
    Server: stringOption(opts.server),
    Port: numberOption(opts.port),
    Database: stringOption(opts.database),
    User: stringOption(opts.user),
    Password: stringOption(opts.password),
    Locations: stringOption(opts.locations),
    Separator: stringOption(opts.separator),
    TransactionMode: stringOption(opts.transactionMode),
    StopOnFailure: booleanOption(opts.stopOnFailure),
    BatchTimeout: numberOption(opts.batchTimeout),
    History: booleanOption(opts.history),
    HistorySchema: stringOption(opts.historySchema),
    HistoryTable: stringOption(opts.historyTable),
    TrustServerCertificate: booleanOption(opts.trustServerCertificate),
    Config: stringOption(opts.config),
    Placeholders: Array.isArray(opts.placeholder) ? opts.placeholder.filter(isString) : undefined,
    DisplayOutput: booleanOption(opts.displayOutput),
    DryRun: booleanOption(opts.dryRun),
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Commander argument parser for integer options.
 */
function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Commander option collector for repeatable options.
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
