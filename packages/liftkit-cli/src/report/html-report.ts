/**
 * Standalone HTML report for a project summary.
 *
 * Every value taken from the summary is escaped; the page has no external
 * assets.
 */

import { escapeHtml, renderSideBySideHtml } from '@liftkit/diff-engine';
import type { ProjectDiffSummary, SideBySideRow } from '@liftkit/diff-engine';

export interface HtmlReportOptions {
  /** Page title (default: liftkit modernization report) */
  title?: string;

  /** Project the report describes */
  projectPath?: string;

  /** Shown in the header when set */
  generatedAt?: Date;

  /** Side-by-side rows keyed by file name */
  sideBySide?: ReadonlyMap<string, readonly SideBySideRow[]>;
}

export const DEFAULT_REPORT_TITLE = 'liftkit modernization report';

const STYLES = `
body { font-family: -apple-system, 'Segoe UI', Helvetica, Arial, sans-serif; margin: 0; padding: 20px; background: #f5f6f8; color: #222; }
.container { max-width: 1200px; margin: 0 auto; background: #fff; border-radius: 8px; box-shadow: 0 2px 12px rgba(0, 0, 0, 0.1); }
.header { padding: 30px; border-bottom: 1px solid #eee; }
.header h1 { margin: 0 0 8px; font-size: 28px; }
.header p { margin: 0; color: #666; }
.content { padding: 30px; }
.section { margin-bottom: 30px; }
.cards { display: flex; flex-wrap: wrap; gap: 16px; }
.card { flex: 1 1 160px; padding: 16px; border-radius: 6px; background: #f0f3ff; }
.card .value { font-size: 26px; font-weight: bold; }
.card .label { color: #555; font-size: 13px; }
table.data { width: 100%; border-collapse: collapse; }
table.data th, table.data td { padding: 8px; border: 1px solid #ddd; text-align: left; }
.failed li { color: #b00020; }
.file { margin-top: 24px; }
.file .stats { color: #666; font-size: 13px; }
`.trim();

function card(label: string, value: string): string {
  return `<div class="card"><div class="value">${escapeHtml(value)}</div><div class="label">${escapeHtml(label)}</div></div>`;
}

function summaryCards(summary: ProjectDiffSummary): string[] {
  const totals = summary.summary;
  return [
    '<div class="section"><h2>Summary</h2><div class="cards">',
    card('Files analyzed', String(totals.total_files_analyzed)),
    card('Files modified', String(totals.total_files_modified)),
    card('Lines added', String(totals.total_lines_added)),
    card('Lines removed', String(totals.total_lines_removed)),
    card('Average similarity', `${totals.average_diff_ratio}%`),
    '</div></div>',
  ];
}

function categoryTable(categories: Record<string, number>): string[] {
  const entries = Object.entries(categories);
  if (entries.length === 0) return [];
  return [
    '<div class="section"><h2>Change categories</h2>',
    '<table class="data"><tr><th>Category</th><th>Sections</th></tr>',
    ...entries.map(([category, count]) => `<tr><td>${escapeHtml(category)}</td><td>${count}</td></tr>`),
    '</table></div>',
  ];
}

function mostModifiedTable(summary: ProjectDiffSummary): string[] {
  if (summary.most_modified_files.length === 0) return [];
  return [
    '<div class="section"><h2>Most modified files</h2>',
    '<table class="data"><tr><th>File</th><th>Lines changed</th><th>Added</th><th>Removed</th></tr>',
    ...summary.most_modified_files.map(
      (file) =>
        `<tr><td>${escapeHtml(file.filename)}</td><td>${file.lines_changed}</td><td>${file.added}</td><td>${file.removed}</td></tr>`,
    ),
    '</table></div>',
  ];
}

function failedList(summary: ProjectDiffSummary): string[] {
  if (summary.failed_files.length === 0) return [];
  return [
    '<div class="section failed"><h2>Failed files</h2><ul>',
    ...summary.failed_files.map(
      (failure) => `<li>${escapeHtml(failure.filename)}: ${escapeHtml(failure.error)}</li>`,
    ),
    '</ul></div>',
  ];
}

function fileSections(
  summary: ProjectDiffSummary,
  sideBySide: ReadonlyMap<string, readonly SideBySideRow[]>,
): string[] {
  const lines: string[] = [];
  for (const file of summary.files) {
    const rows = sideBySide.get(file.filename);
    if (rows === undefined) continue;
    lines.push(
      '<div class="file">',
      `<h3>${escapeHtml(file.filename)}</h3>`,
      `<p class="stats">+${file.added_lines} -${file.removed_lines}, similarity ${file.diff_ratio}%</p>`,
      renderSideBySideHtml(rows),
      '</div>',
    );
  }
  if (lines.length === 0) return [];
  return ['<div class="section"><h2>Changes</h2>', ...lines, '</div>'];
}

/**
 * Render a summary as a complete HTML document.
 */
export function renderHtmlReport(summary: ProjectDiffSummary, options: HtmlReportOptions = {}): string {
  const title = escapeHtml(options.title ?? DEFAULT_REPORT_TITLE);
  const subtitle: string[] = [];
  if (options.projectPath !== undefined) {
    subtitle.push(`<p>Project: ${escapeHtml(options.projectPath)}</p>`);
  }
  if (options.generatedAt !== undefined) {
    subtitle.push(`<p>Generated: ${escapeHtml(options.generatedAt.toISOString())}</p>`);
  }

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${title}</title>`,
    `<style>\n${STYLES}\n</style>`,
    '</head>',
    '<body>',
    '<div class="container">',
    '<div class="header">',
    `<h1>${title}</h1>`,
    ...subtitle,
    '</div>',
    '<div class="content">',
    ...summaryCards(summary),
    ...categoryTable(summary.change_categories),
    ...mostModifiedTable(summary),
    ...failedList(summary),
    ...fileSections(summary, options.sideBySide ?? new Map()),
    '</div>',
    '</div>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
