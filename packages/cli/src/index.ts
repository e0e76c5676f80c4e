/**
 * @module @sluice/cli
 *
 * CLI package for Sluice deployments.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, ParseFileConfig, parseTransactionMode } from './config-loader';
export type { CLIOptions, FileConfig } from './config-loader';
export { RunDeploy } from './commands/deploy';
export { RunStatus } from './commands/status';
export { RunDrop } from './commands/drop';
export { RunHistory } from './commands/history';
