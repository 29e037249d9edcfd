/**
 * Per-command setup and teardown: configuration, logger, exit code.
 */

import { Command } from 'commander';
import { PartialSyncConfig, SyncConfig } from '../models/Config';
import { OutcomeStatus, SyncOutcome, exitCodeFor } from '../models/SyncModels';
import { loadSyncConfig } from '../utils/config/ConfigLoader';
import { ConfigError } from '../utils/config/types';
import { SyncLogger, createLogger, parseLogLevel } from '../utils/logger';
import { logError, logInfo, logSuccess, logWarning } from './output';

export interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

export interface CommandContext {
  config: SyncConfig;
  logger: SyncLogger;
  startTime: number;
}

/**
 * Options declared on the root program, as seen from a sub-command
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  const values: Record<string, unknown> = command.optsWithGlobals();
  return {
    config: typeof values.config === 'string' ? values.config : undefined,
    logLevel: typeof values.logLevel === 'string' ? values.logLevel : undefined
  };
}

export async function createCommandContext(
  command: Command,
  overrides: PartialSyncConfig,
  requireRemote: boolean
): Promise<CommandContext> {
  const globals = readGlobalOptions(command);

  const level = parseLogLevel(globals.logLevel);
  if (globals.logLevel !== undefined && level === undefined) {
    throw new ConfigError(`Invalid --log-level: ${globals.logLevel}`);
  }

  const loaded = await loadSyncConfig({
    env: process.env,
    cwd: process.cwd(),
    configFile: globals.config,
    overrides: { ...overrides, logging: { ...overrides.logging, level } },
    requireRemote
  });

  if (loaded.filePath) {
    logInfo(`Using config: ${loaded.filePath}`);
  }
  for (const warning of loaded.warnings) {
    logWarning(warning);
  }

  const { logging } = loaded.config;
  const logger = createLogger({
    level: logging.level,
    logDir: logging.logDir,
    enableFile: logging.enableFile
  });
  logger.setContext({ component: command.name() });

  return { config: loaded.config, logger, startTime: Date.now() };
}

/**
 * Print the outcome, close the logger and set the process exit code
 */
export async function finishCommand<T>(
  context: CommandContext,
  outcome: SyncOutcome<T>,
  describe: (summary: T) => string,
  counts: (summary: T) => Record<string, number>
): Promise<void> {
  const duration = Date.now() - context.startTime;

  switch (outcome.status) {
    case OutcomeStatus.SUCCESS:
      logSuccess(describe(outcome.summary));
      context.logger.runSummary(context.logger.getContext().component ?? 'wiki-sync', counts(outcome.summary), duration);
      break;
    case OutcomeStatus.CONFIG_ERROR:
      logError(`ERROR: ${outcome.message}`);
      break;
    case OutcomeStatus.RUNTIME_ERROR:
      logError(`ERROR: ${outcome.message}`);
      if (outcome.summary !== undefined) {
        logInfo(describe(outcome.summary));
      }
      break;
  }

  await context.logger.close();
  process.exitCode = exitCodeFor(outcome);
}
