/**
 * liftkit diff <original> <modernized>
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import { Command } from 'commander';
import { SequenceDiffEngine } from '@liftkit/diff-engine';
import { renderHtmlReport } from '../report/html-report.js';
import * as ui from '../ui.js';
import { createContext, parseIntOption } from './context.js';

interface DiffCommandOptions {
  name?: string;
  html?: string;
  context?: number;
}

export function registerDiffCommand(program: Command): void {
  program
    .command('diff')
    .description('Compare two versions of a file and print a unified patch')
    .argument('<original>', 'Original file')
    .argument('<modernized>', 'Rewritten file')
    .option('-n, --name <label>', 'File name shown in the patch headers')
    .option('--html <file>', 'Also write a side-by-side HTML report')
    .option('-c, --context <lines>', 'Context lines per hunk', parseIntOption)
    .action(async (original: string, modernized: string, options: DiffCommandOptions, command: Command) => {
      try {
        const { config, logger } = createContext(command, { contextLines: options.context });
        const engine = new SequenceDiffEngine(logger, {
          contextLines: config.contextLines,
          topFiles: config.topFiles,
          legacyNamespace: config.legacyNamespace,
          targetNamespace: config.targetNamespace,
        });

        const name = options.name ?? basename(original);
        const [before, after] = await Promise.all([readFile(original), readFile(modernized)]);
        const report = engine.compare(before, after, name);

        process.stdout.write(report.unified_diff);
        ui.info(
          `${name}: +${report.added_lines} -${report.removed_lines}, similarity ${report.diff_ratio}%`
        );

        if (options.html) {
          const htmlPath = resolve(options.html);
          const html = renderHtmlReport(engine.summarize([report]), {
            title: `liftkit diff: ${name}`,
            sideBySide: new Map([[name, engine.sideBySide(before, after, name)]]),
          });
          await mkdir(dirname(htmlPath), { recursive: true });
          await writeFile(htmlPath, html, 'utf-8');
          ui.success(`HTML report written to ${htmlPath}`);
        }
      } catch (error) {
        ui.fail(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
