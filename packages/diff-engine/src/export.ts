/**
 * JSON report export.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { DiffReportDocument, ProjectDiffSummary } from './types.js';

/**
 * Persisted form of a summary. `failed_files` is written only when some
 * file failed.
 */
export function toReportDocument(summary: ProjectDiffSummary): DiffReportDocument {
  const document: DiffReportDocument = {
    summary: summary.summary,
    change_categories: summary.change_categories,
    most_modified_files: summary.most_modified_files,
    files: summary.files,
  };
  if (summary.failed_files.length > 0) {
    document.failed_files = summary.failed_files;
  }
  return document;
}

/** Serialize a summary as the JSON report text (2-space indent) */
export function serializeReport(summary: ProjectDiffSummary): string {
  return JSON.stringify(toReportDocument(summary), null, 2);
}

/**
 * Write the JSON report. IO failures are logged and reported as `false`.
 */
export async function exportDiffReportJson(
  summary: ProjectDiffSummary,
  outputPath: string,
  logger: Logger,
): Promise<boolean> {
  const log = logger.child({ component: 'report-export' });
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, serializeReport(summary), 'utf-8');
    log.info({ outputPath, files: summary.files.length }, 'Diff report exported');
    return true;
  } catch (err) {
    log.error(
      { outputPath, error: err instanceof Error ? err.message : String(err) },
      'Failed to export diff report',
    );
    return false;
  }
}
