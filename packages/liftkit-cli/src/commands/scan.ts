/**
 * liftkit scan <project>
 */

import { Command } from 'commander';
import { scanProject } from '../pipeline.js';
import * as ui from '../ui.js';
import { createContext, parseIntOption } from './context.js';

interface ScanCommandOptions {
  output?: string;
  html: boolean;
  reportName?: string;
  context?: number;
}

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Rewrite a project into a sibling directory and report the diff')
    .argument('<project>', 'Path to the project root')
    .option('-o, --output <dir>', 'Output directory (default: <project>_modernized)')
    .option('--no-html', 'Skip the HTML report')
    .option('--report-name <name>', 'Base file name of the reports')
    .option('-c, --context <lines>', 'Context lines per patch hunk', parseIntOption)
    .action(async (project: string, options: ScanCommandOptions, command: Command) => {
      try {
        const { config, logger } = createContext(command, { contextLines: options.context });

        ui.step(`Scanning ${project}`);
        const { scan, reports } = await scanProject(project, config, logger, {
          output: options.output,
          html: options.html,
          reportName: options.reportName,
          contextLines: options.context,
        });

        ui.scanSummary(scan.summary);
        ui.success(`Modernized project written to ${scan.outputPath}`);
        if (reports.json) ui.info(`JSON report: ${reports.json}`);
        else ui.warn('JSON report could not be written');
        if (reports.html) ui.info(`HTML report: ${reports.html}`);
      } catch (error) {
        ui.fail(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
