/**
 * Aggregate command handler - builds the knowledge catalogue from an export.
 */

import path from 'path';
import { Command } from 'commander';
import { KnowledgeAggregator } from '../../knowledge/KnowledgeAggregator';
import { createCommandContext, finishCommand } from '../context';
import { createProgressBar, handleCommandError } from '../output';

interface AggregateCommandOptions {
  input?: string;
  output?: string;
}

export function registerAggregateCommand(program: Command): void {
  program
    .command('aggregate')
    .description('Classify exported pages into a knowledge catalogue JSON file')
    .option('-i, --input <path>', 'Exported wiki tree')
    .option('-o, --output <file>', 'Catalogue file to write')
    .action(async (options: AggregateCommandOptions, command: Command) => {
      try {
        const context = await createCommandContext(
          command,
          {
            aggregate: {
              inputDir: options.input ? path.resolve(options.input) : undefined,
              outputFile: options.output ? path.resolve(options.output) : undefined
            }
          },
          false
        );
        const { aggregate } = context.config;

        const progressBar = createProgressBar('Classifying pages');
        let started = false;

        const outcome = await new KnowledgeAggregator(context.logger).run({
          inputDir: aggregate.inputDir,
          outputFile: aggregate.outputFile,
          onProgress: (done, total) => {
            if (!started) {
              progressBar.start(total, 0);
              started = true;
            }
            progressBar.update(done);
          }
        });

        if (started) {
          progressBar.stop();
        }

        await finishCommand(
          context,
          outcome,
          summary => `Wrote ${summary.itemCount} item(s) to ${summary.outputFile} ` +
            `(${Object.entries(summary.byCategory).map(([c, n]) => `${c}: ${n}`).join(', ')})`,
          summary => ({ items: summary.itemCount, ...summary.byCategory })
        );
      } catch (error: unknown) {
        handleCommandError(error);
      }
    });
}
