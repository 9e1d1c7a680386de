/**
 * liftkit CLI - rewrite legacy Java projects and report the diff
 */

import { Command } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerDiffCommand } from './commands/diff.js';
import { registerScanCommand } from './commands/scan.js';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('liftkit')
    .description('Move Java projects to Java 21 and Spring Boot 3, with diff reports')
    .version(version)
    .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace, silent)')
    .option('--pretty', 'Human-readable log output');

  registerScanCommand(program);
  registerDiffCommand(program);
  registerAnalyzeCommand(program);
  registerBatchCommand(program);

  return program;
}
