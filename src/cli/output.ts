/**
 * Shared output helpers for CLI commands.
 */

import chalk from 'chalk';
import { SingleBar, Presets } from 'cli-progress';
import { ConfigError } from '../utils/config/types';

export function logSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function logError(message: string): void {
  console.log(chalk.red('✗'), message);
}

export function logWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function logInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function createProgressBar(description: string): SingleBar {
  return new SingleBar({
    format: `${chalk.blue(description)} |{bar}| {percentage}% | {value}/{total}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true
  }, Presets.rect);
}

/**
 * CLI-specific error with an optional error code.
 */
export class CLIError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Report an error that escaped a command and set the exit code:
 * 2 for configuration problems, 1 for everything else.
 */
export function handleCommandError(error: unknown): void {
  if (error instanceof ConfigError) {
    logError(`ERROR: ${error.message}`);
    if (error.configPath) {
      logInfo(`Config file: ${error.configPath}`);
    }
    process.exitCode = 2;
    return;
  }

  if (error instanceof CLIError) {
    logError(error.message);
    if (error.code) {
      logInfo(`Error code: ${error.code}`);
    }
  } else {
    logError('Command failed:');
    console.error(error);
  }
  process.exitCode = 1;
}
