/**
 * Project-level aggregation of file reports.
 */

import { roundRatio } from './similarity.js';
import type {
  DiffReport,
  FailedFileDiff,
  FileDiffOutcome,
  MostModifiedFile,
  ProjectDiffSummary,
} from './types.js';
import { DEFAULT_DIFF_ENGINE_CONFIG } from './types.js';

/**
 * Summarize reports in submission order.
 *
 * The most-modified ranking is sorted by changed lines, descending; ties keep
 * submission order. An empty set has an average ratio of 100.
 */
export function summarize(
  reports: readonly DiffReport[],
  topFiles: number = DEFAULT_DIFF_ENGINE_CONFIG.topFiles,
): ProjectDiffSummary {
  let totalOriginal = 0;
  let totalModernized = 0;
  let totalAdded = 0;
  let totalRemoved = 0;
  let totalChanged = 0;
  let modified = 0;
  let ratioSum = 0;
  const categories: Record<string, number> = {};

  for (const report of reports) {
    totalOriginal += report.original_lines;
    totalModernized += report.modernized_lines;
    totalAdded += report.added_lines;
    totalRemoved += report.removed_lines;
    totalChanged += report.changed_lines;
    ratioSum += report.diff_ratio;
    if (report.changed_lines > 0) modified += 1;

    for (const section of report.changed_sections) {
      categories[section.change_type] = (categories[section.change_type] ?? 0) + 1;
    }
  }

  // Array.prototype.sort is stable
  const mostModified: MostModifiedFile[] = [...reports]
    .sort((a, b) => b.changed_lines - a.changed_lines)
    .slice(0, Math.max(0, topFiles))
    .map((report) => ({
      filename: report.filename,
      lines_changed: report.changed_lines,
      added: report.added_lines,
      removed: report.removed_lines,
    }));

  return {
    summary: {
      total_files_analyzed: reports.length,
      total_files_modified: modified,
      total_original_lines: totalOriginal,
      total_modernized_lines: totalModernized,
      total_lines_added: totalAdded,
      total_lines_removed: totalRemoved,
      total_lines_changed: totalChanged,
      average_diff_ratio: reports.length > 0 ? roundRatio(ratioSum / reports.length) : 100,
    },
    change_categories: categories,
    most_modified_files: mostModified,
    files: [...reports],
    failed_files: [],
  };
}

/**
 * Summarize a mix of reports and failures. Failures are left out of every
 * total and listed under `failed_files`.
 */
export function summarizeOutcomes(
  outcomes: readonly FileDiffOutcome[],
  topFiles: number = DEFAULT_DIFF_ENGINE_CONFIG.topFiles,
): ProjectDiffSummary {
  const reports: DiffReport[] = [];
  const failures: FailedFileDiff[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      reports.push(outcome.report);
    } else {
      failures.push(outcome.failure);
    }
  }
  return { ...summarize(reports, topFiles), failed_files: failures };
}
