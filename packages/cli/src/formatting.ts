/**
 * @module formatting
 * Console output formatting for the Sluice CLI.
 * Provides colored, structured output for deployment status and progress.
 */

import chalk from 'chalk';
import { ApplyResult, ApplyStatus, BatchOutput, HistoryRecord, ObjectState, ObjectStatus, Script } from '@sluice/core';

/**
 * Prints the Sluice banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  Sluice') + chalk.gray(' — idempotent SQL Server object deployments'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Formats the object status table for the `status` command.
 */
export function PrintStatusTable(statuses: ObjectStatus[]): void {
  if (statuses.length === 0) {
    console.log(chalk.yellow('  No scripts found.'));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Script', 50) +
      padRight('State', 16) +
      padRight('Last deployed', 22) +
      'Changed'
  );
  console.log(chalk.gray('  ' + '─'.repeat(96)));

  for (const status of statuses) {
    const stateColor = getStateColor(status.State);
    const lastDeployed = status.LastDeployment ? status.LastDeployment.InstalledOn.toISOString().substring(0, 19) : '';

    console.log(
      '  ' +
        padRight(truncate(status.Script, 48), 50) +
        stateColor(padRight(status.State, 16)) +
        chalk.gray(padRight(lastDeployed, 22)) +
        formatChanged(status.ChecksumChanged)
    );
  }
  console.log();
}

/**
 * Formats the history table for the `history` command.
 */
export function PrintHistoryTable(records: HistoryRecord[]): void {
  if (records.length === 0) {
    console.log(chalk.yellow('  No deployments recorded.'));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Rank', 8) +
      padRight('Script', 50) +
      padRight('Status', 12) +
      padRight('Installed on', 22) +
      'Time'
  );
  console.log(chalk.gray('  ' + '─'.repeat(100)));

  for (const record of records) {
    const status = record.RolledBack ? 'rolled back' : record.Status;
    const statusColor = record.Status === 'succeeded' && !record.RolledBack ? chalk.green : chalk.red;

    console.log(
      '  ' +
        padRight(String(record.DeployRank), 8) +
        padRight(truncate(record.Script, 48), 50) +
        statusColor(padRight(status, 12)) +
        chalk.gray(padRight(record.InstalledOn.toISOString().substring(0, 19), 22)) +
        chalk.gray(formatElapsed(record.ExecutionTime))
    );
  }
  console.log();
}

/**
 * Logs a script execution start.
 */
export function LogScriptStart(script: Script): void {
  process.stdout.write(chalk.gray('  ') + chalk.white(`Applying ${script.Name}...`));
}

/**
 * Logs a script execution result.
 */
export function LogScriptEnd(result: ApplyResult): void {
  if (result.Succeeded) {
    console.log(chalk.green(` OK`) + chalk.gray(` (${result.BatchesApplied} batch(es), ${result.ExecutionTimeMS}ms)`));
  } else {
    console.log(chalk.red(` FAILED`) + chalk.gray(` after ${result.BatchesApplied}/${result.TotalBatches} batch(es)`));
    if (result.Error) {
      console.log(chalk.red(`    ${result.Error.message}`));
    }
  }
}

/**
 * Prints what one batch returned: server messages first, then each result set.
 */
export function PrintBatchOutput(output: BatchOutput): void {
  for (const message of output.Messages) {
    console.log(chalk.gray(`    ${message}`));
  }
  for (const recordset of output.Recordsets) {
    const [header, ...rows] = formatRecordset(recordset);
    if (header === undefined) {
      continue;
    }
    console.log('    ' + chalk.bold(header));
    rows.forEach((row) => console.log('    ' + row));
  }
}

/**
 * Renders a result set as a header line of column names followed by one
 * line per row, columns joined by ` | `. An empty set renders nothing.
 */
export function formatRecordset(rows: readonly Record<string, unknown>[]): string[] {
  if (rows.length === 0) {
    return [];
  }
  const columns = Object.keys(rows[0]);
  return [
    columns.join(' | '),
    ...rows.map((row) => columns.map((column) => formatCell(row[column])).join(' | ')),
  ];
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Prints the final per-script outcome list after a deployment.
 */
export function PrintResultList(results: readonly ApplyResult[]): void {
  for (const result of results) {
    const label = result.RolledBack ? 'rolled back' : result.Status;
    console.log('  ' + getStatusColor(result.Status, result.RolledBack)(padRight(label, 16)) + result.Script);
  }
}

/**
 * Prints a summary banner after a deploy operation.
 */
export function PrintDeploySummary(
  applied: number,
  failed: number,
  notAttempted: number,
  totalMs: number,
  success: boolean,
  errorMessage?: string
): void {
  console.log();
  console.log(chalk.gray('  ' + '─'.repeat(50)));

  if (success) {
    console.log(
      chalk.green.bold('  SUCCESS') +
      chalk.gray(` — ${applied} script(s) applied in ${formatElapsed(totalMs)}`)
    );
  } else {
    console.log(
      chalk.red.bold('  FAILED') +
      chalk.gray(` — ${applied} applied, ${failed} failed, ${notAttempted} not attempted`)
    );
    if (errorMessage) {
      console.log(chalk.red(`  ${errorMessage}`));
    }
  }

  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Formats elapsed time in a human-readable way.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function formatChanged(changed: boolean | null): string {
  if (changed === null) {
    return chalk.gray('-');
  }
  return changed ? chalk.yellow('yes') : chalk.gray('no');
}

/**
 * Returns a chalk color function for an object state.
 */
function getStateColor(state: ObjectState): chalk.Chalk {
  switch (state) {
    case 'present':
      return chalk.green;
    case 'missing':
      return chalk.yellow;
    case 'kind-mismatch':
      return chalk.red;
    case 'untracked':
      return chalk.gray;
    default:
      return chalk.white;
  }
}

function getStatusColor(status: ApplyStatus, rolledBack: boolean): chalk.Chalk {
  if (rolledBack) {
    return chalk.magenta;
  }
  switch (status) {
    case 'succeeded':
      return chalk.green;
    case 'failed':
      return chalk.red;
    default:
      return chalk.gray;
  }
}

/**
 * Right-pads a string to a given width.
 */
function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

/**
 * Truncates a string to a maximum length, appending '...' if needed.
 */
export function truncate(str: string, maxLen: number): string {
  return str.length <= maxLen ? str : str.substring(0, maxLen - 3) + '...';
}
