/**
 * liftkit analyze <project>
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import { Command } from 'commander';
import type { IssueSeverity } from '@liftkit/rewrite-rules';
import { analyzeProject } from '../analyze-project.js';
import type { FileAnalysis } from '../analyze-project.js';
import { applyProjectConfig, loadProjectConfig } from '../project-config.js';
import * as ui from '../ui.js';
import { assertProjectPath } from '../utils/validator.js';
import { ProjectWalker } from '../walker.js';
import { createContext } from './context.js';

interface AnalyzeCommandOptions {
  json?: boolean;
}

const SEVERITY_LABEL: Record<IssueSeverity, string> = {
  error: chalk.red('error  '),
  warning: chalk.yellow('warning'),
  info: chalk.dim('info   '),
};

function printFindings(findings: readonly FileAnalysis[]): void {
  for (const { relativePath, analysis } of findings) {
    console.log(chalk.bold(`  ${relativePath}`) + chalk.dim(` (${analysis.fileType})`));
    for (const issue of analysis.issues) {
      const where = issue.line !== undefined ? chalk.dim(`:${issue.line}`) : '';
      console.log(`    ${SEVERITY_LABEL[issue.severity]}${where} ${issue.message}`);
      if (issue.suggestion) console.log(chalk.dim(`             ${issue.suggestion}`));
    }
    for (const recommendation of analysis.recommendations) {
      console.log(chalk.cyan('    → ') + recommendation.message);
    }
    console.log();
  }
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Report outdated settings and sources without changing anything')
    .argument('<project>', 'Path to the project root')
    .option('--json', 'Print findings as JSON')
    .action(async (project: string, options: AnalyzeCommandOptions, command: Command) => {
      try {
        const { config, logger } = createContext(command);
        const projectPath = await assertProjectPath(resolve(project));

        const loaded = await loadProjectConfig(projectPath);
        if (!loaded.success) {
          throw new Error(
            `Invalid project configuration: ${loaded.errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`
          );
        }

        const walker = new ProjectWalker(logger, applyProjectConfig(config, loaded.config));
        const findings = await analyzeProject(walker, projectPath, logger);

        if (options.json) {
          console.log(JSON.stringify(findings, null, 2));
          return;
        }

        if (findings.length === 0) {
          ui.success('No outdated settings found');
          return;
        }

        console.log();
        printFindings(findings);
        const issues = findings.reduce((n, f) => n + f.analysis.issues.length, 0);
        const recommendations = findings.reduce((n, f) => n + f.analysis.recommendations.length, 0);
        ui.info(`${findings.length} file(s), ${issues} issue(s), ${recommendations} recommendation(s)`);
      } catch (error) {
        ui.fail(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
