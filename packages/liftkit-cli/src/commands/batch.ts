/**
 * liftkit batch <projects...>
 */

import { Command } from 'commander';
import { runBatch } from '../pipeline.js';
import * as ui from '../ui.js';
import { createContext } from './context.js';

interface BatchCommandOptions {
  html: boolean;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Scan several projects in order')
    .argument('<projects...>', 'Project roots')
    .option('--no-html', 'Skip the HTML reports')
    .action(async (projects: string[], options: BatchCommandOptions, command: Command) => {
      try {
        const { config, logger } = createContext(command);

        const report = await runBatch(projects, config, logger, { html: options.html }, (entry, index) => {
          const position = `[${index + 1}/${projects.length}]`;
          if (entry.status === 'success') {
            ui.success(`${position} ${entry.project}: ${entry.filesModified} file(s) modified`);
          } else {
            ui.warn(`${position} ${entry.project}: ${entry.error}`);
          }
        });

        ui.batchSummary(report);
        if (report.failed > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        ui.fail(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
