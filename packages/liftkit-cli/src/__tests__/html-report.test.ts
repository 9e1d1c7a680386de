import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { SequenceDiffEngine, toReportDocument } from '@liftkit/diff-engine';
import type { ProjectDiffSummary, SideBySideRow } from '@liftkit/diff-engine';
import { DEFAULT_REPORT_TITLE, renderHtmlReport } from '../report/html-report.js';
import { writeReports } from '../report/write-reports.js';

const logger = pino({ level: 'silent' });
const engine = new SequenceDiffEngine(logger);
const FILE = 'x<y>.txt';

function sampleSummary(): { summary: ProjectDiffSummary; rows: SideBySideRow[] } {
  const report = engine.compare('a\n', 'b\n', FILE);
  return { summary: engine.summarize([report]), rows: engine.sideBySide('a\n', 'b\n', FILE) };
}

// ============================================================
// renderHtmlReport
// ============================================================

describe('renderHtmlReport', () => {
  it('renders escaped summary tables and side-by-side views', () => {
    const { summary, rows } = sampleSummary();
    const lines = renderHtmlReport(summary, {
      title: 'T & U',
      projectPath: '/work/demo',
      generatedAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
      sideBySide: new Map([[FILE, rows]]),
    }).split('\n');

    expect(lines[0]).toBe('<!DOCTYPE html>');
    expect(lines).toContain('<title>T &amp; U</title>');
    expect(lines).toContain('<h1>T &amp; U</h1>');
    expect(lines).toContain('<p>Project: /work/demo</p>');
    expect(lines).toContain('<p>Generated: 2024-01-02T03:04:05.000Z</p>');
    expect(lines).toContain(
      '<div class="card"><div class="value">50%</div><div class="label">Average similarity</div></div>'
    );
    expect(lines).toContain('<tr><td>code_updated</td><td>1</td></tr>');
    expect(lines).toContain('<tr><td>x&lt;y&gt;.txt</td><td>2</td><td>1</td><td>1</td></tr>');
    expect(lines).toContain('<h3>x&lt;y&gt;.txt</h3>');
    expect(lines).toContain('<p class="stats">+1 -1, similarity 50%</p>');
    expect(lines).toContain(
      '<tr><td style="padding: 5px; border: 1px solid #ddd; background-color: #ffeecc;">a</td>' +
        '<td style="padding: 5px; border: 1px solid #ddd; background-color: #eeffcc;">b</td></tr>'
    );
    expect(lines).not.toContain('<div class="section failed"><h2>Failed files</h2><ul>');
  });

  it('lists failed files and omits empty sections', () => {
    const summary = engine.summarizeOutcomes([
      { ok: false, failure: { filename: 'Bad.java', error: 'bad <bytes>' } },
    ]);
    const lines = renderHtmlReport(summary).split('\n');

    expect(lines).toContain(`<title>${DEFAULT_REPORT_TITLE}</title>`);
    expect(lines).toContain('<li>Bad.java: bad &lt;bytes&gt;</li>');
    expect(lines).not.toContain('<div class="section"><h2>Change categories</h2>');
    expect(lines).not.toContain('<div class="section"><h2>Changes</h2>');
  });
});

// ============================================================
// writeReports
// ============================================================

describe('writeReports', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'liftkit-test-reports-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('writes JSON and HTML under a sanitized name', async () => {
    const { summary } = sampleSummary();
    const reportsDir = join(tmpDir, 'reports');

    const written = await writeReports(summary, reportsDir, logger, { reportName: 'my/report' });

    expect(written).toEqual({
      json: join(reportsDir, 'my_report.json'),
      html: join(reportsDir, 'my_report.html'),
    });
    const document: unknown = JSON.parse(await readFile(join(reportsDir, 'my_report.json'), 'utf-8'));
    expect(document).toEqual(toReportDocument(summary));
    const html = await readFile(join(reportsDir, 'my_report.html'), 'utf-8');
    expect(html.startsWith('<!DOCTYPE html>\n')).toBe(true);
  });

  it('skips the HTML report when disabled', async () => {
    const { summary } = sampleSummary();

    const written = await writeReports(summary, tmpDir, logger, { html: false });

    expect(written).toEqual({ json: join(tmpDir, 'diff-report.json') });
    await expect(stat(join(tmpDir, 'diff-report.html'))).rejects.toThrow();
  });
});
