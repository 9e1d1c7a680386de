/**
 * Project-level flows shared by the scan and batch commands.
 */

import { basename, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import { applyProjectConfig, loadProjectConfig } from './project-config.js';
import type { WrittenReports } from './report/write-reports.js';
import { writeReports } from './report/write-reports.js';
import type { BatchEntry, BatchReport, CliConfig, ScanResult } from './types.js';
import { assertProjectPath } from './utils/validator.js';
import { validateCliConfig } from './config.js';
import { ProjectWalker } from './walker.js';

/** Directory inside the output tree that receives the reports */
export const REPORTS_DIR = 'reports';

export interface ScanProjectOptions {
  /** Output directory (default: project path plus the output suffix) */
  output?: string;

  /** Write the HTML report (default: true) */
  html?: boolean;

  /** Base file name of the reports */
  reportName?: string;

  /** Context lines from the command line; wins over `.liftkit.yaml` */
  contextLines?: number;

  /** Clock for generated headers and report timestamps */
  clock?: () => Date;
}

export interface ScanProjectResult {
  scan: ScanResult;
  reports: WrittenReports;
}

/**
 * Validate a project, apply its `.liftkit.yaml`, rewrite it and write the
 * reports into the output tree.
 *
 * @throws ProjectPathError when the project path is unusable
 * @throws Error when the project configuration is invalid
 */
export async function scanProject(
  projectInput: string,
  baseConfig: CliConfig,
  logger: Logger,
  options: ScanProjectOptions = {}
): Promise<ScanProjectResult> {
  const projectPath = await assertProjectPath(resolve(projectInput));

  const loaded = await loadProjectConfig(projectPath);
  if (!loaded.success) {
    const details = loaded.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    throw new Error(`Invalid project configuration: ${details}`);
  }

  const projectConfig = applyProjectConfig(baseConfig, loaded.config);
  const config: CliConfig = {
    ...projectConfig,
    contextLines: options.contextLines ?? projectConfig.contextLines,
  };
  const errors = validateCliConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  const clock = options.clock ?? (() => new Date());
  const walker = new ProjectWalker(logger, config, { clock });
  const outputPath = options.output ? resolve(options.output) : walker.defaultOutputPath(projectPath);

  const scan = await walker.scan(projectPath, outputPath);
  const reports = await writeReports(scan.summary, join(outputPath, REPORTS_DIR), logger, {
    html: options.html,
    reportName: options.reportName,
    projectPath,
    generatedAt: clock(),
    sideBySide: scan.sideBySide,
  });

  return { scan, reports };
}

/**
 * Scan projects one after another. A failing project is recorded and the
 * batch moves on.
 */
export async function runBatch(
  projects: readonly string[],
  config: CliConfig,
  logger: Logger,
  options: Omit<ScanProjectOptions, 'output'> = {},
  onProject?: (entry: BatchEntry, index: number) => void
): Promise<BatchReport> {
  const log = logger.child({ component: 'batch' });
  const started = Date.now();
  const results: BatchEntry[] = [];

  log.info({ projects: projects.length }, 'Batch started');

  for (const [index, project] of projects.entries()) {
    const name = basename(resolve(project));
    log.info({ project: name, position: index + 1, total: projects.length }, 'Processing project');

    let entry: BatchEntry;
    try {
      const { scan } = await scanProject(project, config, logger, options);
      entry = {
        project: name,
        status: 'success',
        outputPath: scan.outputPath,
        filesModified: scan.summary.summary.total_files_modified,
      };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ project: name, error }, 'Project failed');
      entry = { project: name, status: 'failed', error };
    }

    results.push(entry);
    onProject?.(entry, index);
  }

  const successful = results.filter((r) => r.status === 'success').length;
  const report: BatchReport = {
    totalProjects: projects.length,
    successful,
    failed: results.length - successful,
    durationMs: Date.now() - started,
    results,
  };

  log.info({ successful: report.successful, failed: report.failed }, 'Batch complete');
  return report;
}
