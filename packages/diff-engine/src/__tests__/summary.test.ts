import { describe, it, expect } from 'vitest';
import { summarize, summarizeOutcomes } from '../summary.js';
import type { ChangeCategory, DiffReport } from '../types.js';

function makeReport(overrides?: Partial<DiffReport>): DiffReport {
  return {
    filename: 'File.java',
    original_lines: 10,
    modernized_lines: 10,
    added_lines: 0,
    removed_lines: 0,
    changed_lines: 0,
    diff_ratio: 100,
    unified_diff: '',
    changed_sections: [],
    ...overrides,
  };
}

function section(changeType: ChangeCategory): DiffReport['changed_sections'][number] {
  return {
    type: 'replace',
    original_start: 1,
    original_end: 1,
    modernized_start: 1,
    modernized_end: 1,
    original_code: 'a',
    modernized_code: 'b',
    change_type: changeType,
  };
}

describe('summarize', () => {
  it('ranks most modified files by changed lines, descending', () => {
    const summary = summarize([
      makeReport({ filename: 'a', changed_lines: 5, added_lines: 3, removed_lines: 2 }),
      makeReport({ filename: 'b', changed_lines: 20, added_lines: 10, removed_lines: 10 }),
      makeReport({ filename: 'c', changed_lines: 1, added_lines: 1 }),
    ]);

    expect(summary.most_modified_files).toEqual([
      { filename: 'b', lines_changed: 20, added: 10, removed: 10 },
      { filename: 'a', lines_changed: 5, added: 3, removed: 2 },
      { filename: 'c', lines_changed: 1, added: 1, removed: 0 },
    ]);
  });

  it('keeps submission order on ties', () => {
    const summary = summarize([
      makeReport({ filename: 'first', changed_lines: 2 }),
      makeReport({ filename: 'second', changed_lines: 4 }),
      makeReport({ filename: 'third', changed_lines: 2 }),
    ]);
    expect(summary.most_modified_files.map((f) => f.filename)).toEqual([
      'second',
      'first',
      'third',
    ]);
  });

  it('keeps only the top files', () => {
    const reports = [1, 2, 3, 4, 5, 6, 7].map((n) =>
      makeReport({ filename: `f${n}`, changed_lines: n }),
    );
    expect(summarize(reports).most_modified_files.map((f) => f.filename)).toEqual([
      'f7',
      'f6',
      'f5',
      'f4',
      'f3',
    ]);
    expect(summarize(reports, 2).most_modified_files).toHaveLength(2);
  });

  it('sums totals', () => {
    const summary = summarize([
      makeReport({
        original_lines: 10,
        modernized_lines: 12,
        added_lines: 3,
        removed_lines: 1,
        changed_lines: 4,
        diff_ratio: 100,
      }),
      makeReport({ original_lines: 5, modernized_lines: 5, diff_ratio: 50 }),
      makeReport({ original_lines: 1, modernized_lines: 2, added_lines: 1, changed_lines: 1, diff_ratio: 33.33 }),
    ]);

    expect(summary.summary).toEqual({
      total_files_analyzed: 3,
      total_files_modified: 2,
      total_original_lines: 16,
      total_modernized_lines: 19,
      total_lines_added: 4,
      total_lines_removed: 1,
      total_lines_changed: 5,
      average_diff_ratio: 61.11,
    });
  });

  it('counts categories in first-seen order', () => {
    const summary = summarize([
      makeReport({ changed_sections: [section('import_added'), section('code_updated')] }),
      makeReport({ changed_sections: [section('code_updated'), section('namespace_migration')] }),
    ]);
    expect(Object.entries(summary.change_categories)).toEqual([
      ['import_added', 1],
      ['code_updated', 2],
      ['namespace_migration', 1],
    ]);
  });

  it('summarizes an empty set', () => {
    const summary = summarize([]);
    expect(summary.summary.total_files_analyzed).toBe(0);
    expect(summary.summary.average_diff_ratio).toBe(100);
    expect(summary.most_modified_files).toEqual([]);
    expect(summary.change_categories).toEqual({});
    expect(summary.failed_files).toEqual([]);
  });
});

describe('summarizeOutcomes', () => {
  it('excludes failures from totals and lists them', () => {
    const summary = summarizeOutcomes([
      { ok: true, report: makeReport({ filename: 'ok.java', changed_lines: 2 }) },
      { ok: false, failure: { filename: 'broken.java', error: 'unreadable' } },
      { ok: true, report: makeReport({ filename: 'fine.java' }) },
    ]);

    expect(summary.summary.total_files_analyzed).toBe(2);
    expect(summary.files.map((f) => f.filename)).toEqual(['ok.java', 'fine.java']);
    expect(summary.failed_files).toEqual([{ filename: 'broken.java', error: 'unreadable' }]);
  });
});
