#!/usr/bin/env node

/**
 * Command line interface for wiki-sync
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { registerAggregateCommand } from './cli/commands/aggregate';
import { registerDownloadCommand } from './cli/commands/download';
import { registerUploadCommand } from './cli/commands/upload';
import { handleCommandError } from './cli/output';
import { installProcessHandlers } from './cli/setup';

// Values from .env never override variables already set in the environment
dotenv.config();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('wiki-sync')
    .description('Mirror an Azure DevOps wiki to disk and push local knowledge folders back')
    .version('1.0.0')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('--log-level <level>', 'Log level: error, warn, info, http, debug');

  registerDownloadCommand(program);
  registerUploadCommand(program);
  registerAggregateCommand(program);

  return program;
}

const program = createProgram();

export default program;

if (require.main === module) {
  installProcessHandlers();
  program.parseAsync(process.argv).catch(handleCommandError);
}
