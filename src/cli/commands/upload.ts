/**
 * Upload command handler - pushes local knowledge folders to the wiki.
 */

import path from 'path';
import { Command } from 'commander';
import { WikiClient } from '../../wiki/WikiClient';
import { WikiImporter } from '../../sync/WikiImporter';
import { OutcomeStatus } from '../../models/SyncModels';
import { createCommandContext, finishCommand } from '../context';
import { handleCommandError, logWarning } from '../output';

interface UploadCommandOptions {
  root?: string;
  wiki?: string;
  folders?: string;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Create or update wiki pages from local knowledge folders')
    .option('-r, --root <path>', 'Local root holding one folder per category')
    .option('-w, --wiki <name>', 'Wiki name (created when missing)')
    .option('-f, --folders <list>', 'Comma-separated folders to upload, or "*" for all')
    .action(async (options: UploadCommandOptions, command: Command) => {
      try {
        const folders = options.folders
          ?.split(',')
          .map(f => f.trim())
          .filter(f => f.length > 0);

        const context = await createCommandContext(
          command,
          {
            azureDevOps: { wiki: options.wiki },
            upload: {
              root: options.root ? path.resolve(options.root) : undefined,
              folders: folders && folders.length > 0 ? folders : undefined
            }
          },
          true
        );
        const { azureDevOps, upload } = context.config;
        const wikiName = azureDevOps.wiki ?? upload.defaultWikiName;
        context.logger.setContext({ wiki: wikiName });

        const importer = new WikiImporter(new WikiClient(azureDevOps, context.logger), context.logger);
        const outcome = await importer.run({ wikiName, root: upload.root, folders: upload.folders });

        if (outcome.status === OutcomeStatus.RUNTIME_ERROR && outcome.summary) {
          for (const failure of outcome.summary.failed) {
            logWarning(`${failure.pagePath}: ${failure.reason}`);
          }
        }

        await finishCommand(
          context,
          outcome,
          summary => `Uploaded ${summary.folders.length} folder(s): ${summary.created.length} created, ` +
            `${summary.updated.length} updated, ${summary.failed.length} failed`,
          summary => ({
            folders: summary.folders.length,
            created: summary.created.length,
            updated: summary.updated.length,
            failed: summary.failed.length
          })
        );
      } catch (error: unknown) {
        handleCommandError(error);
      }
    });
}
