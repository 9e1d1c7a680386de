/**
 * Writes the JSON and HTML reports of a scan.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { exportDiffReportJson } from '@liftkit/diff-engine';
import type { ProjectDiffSummary } from '@liftkit/diff-engine';
import { sanitizeFilename } from '../utils/validator.js';
import type { HtmlReportOptions } from './html-report.js';
import { renderHtmlReport } from './html-report.js';

export const DEFAULT_REPORT_NAME = 'diff-report';

export interface WriteReportsOptions extends HtmlReportOptions {
  /** Base file name of both reports (default: diff-report) */
  reportName?: string;

  /** Also write the HTML report (default: true) */
  html?: boolean;
}

/** Paths of the reports that were written */
export interface WrittenReports {
  json?: string;
  html?: string;
}

/**
 * Write `<name>.json` and `<name>.html` into `reportsDir`. A report that
 * cannot be written is logged and left out of the result.
 */
export async function writeReports(
  summary: ProjectDiffSummary,
  reportsDir: string,
  logger: Logger,
  options: WriteReportsOptions = {}
): Promise<WrittenReports> {
  const log = logger.child({ component: 'report-writer' });
  const name = sanitizeFilename(options.reportName ?? DEFAULT_REPORT_NAME);
  const written: WrittenReports = {};

  const jsonPath = join(reportsDir, `${name}.json`);
  if (await exportDiffReportJson(summary, jsonPath, logger)) {
    written.json = jsonPath;
  }

  if (options.html ?? true) {
    const htmlPath = join(reportsDir, `${name}.html`);
    try {
      await mkdir(reportsDir, { recursive: true });
      await writeFile(htmlPath, renderHtmlReport(summary, options), 'utf-8');
      written.html = htmlPath;
      log.info({ htmlPath }, 'HTML report written');
    } catch (err) {
      log.error(
        { htmlPath, error: err instanceof Error ? err.message : String(err) },
        'Failed to write HTML report'
      );
    }
  }

  return written;
}
