/**
 * Download command handler - exports the wiki into a local tree.
 */

import path from 'path';
import { Command } from 'commander';
import { WikiClient } from '../../wiki/WikiClient';
import { WikiExporter } from '../../sync/WikiExporter';
import { createCommandContext, finishCommand } from '../context';
import { handleCommandError } from '../output';

interface DownloadCommandOptions {
  outputDir?: string;
  wiki?: string;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Export every page of the wiki into a local directory tree')
    .option('-o, --output-dir <path>', 'Export directory')
    .option('-w, --wiki <name>', 'Wiki name (defaults to the project wiki)')
    .action(async (options: DownloadCommandOptions, command: Command) => {
      try {
        const context = await createCommandContext(
          command,
          {
            azureDevOps: { wiki: options.wiki },
            download: { outputDir: options.outputDir ? path.resolve(options.outputDir) : undefined }
          },
          true
        );
        const { azureDevOps, download } = context.config;
        context.logger.setContext({ wiki: azureDevOps.wiki });

        const exporter = new WikiExporter(new WikiClient(azureDevOps, context.logger), context.logger);
        const outcome = await exporter.run({ wikiName: azureDevOps.wiki, outputDir: download.outputDir });

        await finishCommand(
          context,
          outcome,
          summary => `Exported ${summary.exported} file(s), ${summary.createdDirs} folder(s), ` +
            `${summary.skipped} skipped -> ${summary.outputDir}`,
          summary => ({ exported: summary.exported, createdDirs: summary.createdDirs, skipped: summary.skipped })
        );
      } catch (error: unknown) {
        handleCommandError(error);
      }
    });
}
