/**
 * Types for the diff engine.
 *
 * Report shapes use the snake_case field names of the persisted JSON report,
 * so a DiffReport can be written to disk as-is.
 */

/** Alignment step between two sequences */
export type OpcodeKind = 'equal' | 'insert' | 'delete' | 'replace';

/** Half-open index range [start, end) */
export type IndexRange = readonly [start: number, end: number];

/** One alignment step over an original and a target sequence */
export interface Opcode {
  kind: OpcodeKind;

  /** Range in the original sequence */
  origin: IndexRange;

  /** Range in the target (modernized) sequence */
  target: IndexRange;
}

/** Semantic label applied to a changed region */
export type ChangeCategory =
  | 'namespace_migration'
  | 'import_added'
  | 'import_removed'
  | 'comment_added'
  | 'deprecated_removed'
  | 'code_updated';

/** A non-equal region of a line alignment */
export interface ChangedSection {
  /** Opcode kind that produced this section */
  type: Exclude<OpcodeKind, 'equal'>;

  /** First original line (1-based) */
  original_start: number;

  /** Last original line (1-based, inclusive) */
  original_end: number;

  /** First modernized line (1-based) */
  modernized_start: number;

  /** Last modernized line (1-based, inclusive) */
  modernized_end: number;

  /** Original slice, trimmed */
  original_code: string;

  /** Modernized slice, trimmed */
  modernized_code: string;

  change_type: ChangeCategory;
}

/** Comparison of one file */
export interface DiffReport {
  filename: string;
  original_lines: number;
  modernized_lines: number;
  added_lines: number;
  removed_lines: number;
  changed_lines: number;

  /** Character-level similarity, 0-100, two decimals */
  diff_ratio: number;

  unified_diff: string;
  changed_sections: ChangedSection[];
}

/** A file whose comparison could not be produced */
export interface FailedFileDiff {
  filename: string;
  error: string;
}

/** Either a finished report or a failure marker, in submission order */
export type FileDiffOutcome =
  | { ok: true; report: DiffReport }
  | { ok: false; failure: FailedFileDiff };

/** Aggregate statistics of a project summary */
export interface DiffTotals {
  total_files_analyzed: number;
  total_files_modified: number;
  total_original_lines: number;
  total_modernized_lines: number;
  total_lines_added: number;
  total_lines_removed: number;
  total_lines_changed: number;
  average_diff_ratio: number;
}

/** Ranking entry for the most modified files */
export interface MostModifiedFile {
  filename: string;
  lines_changed: number;
  added: number;
  removed: number;
}

/** Aggregation of many DiffReports */
export interface ProjectDiffSummary {
  summary: DiffTotals;
  change_categories: Record<string, number>;
  most_modified_files: MostModifiedFile[];
  files: DiffReport[];

  /** Files excluded from the totals because their comparison failed */
  failed_files: FailedFileDiff[];
}

/** Persisted JSON report document */
export interface DiffReportDocument {
  summary: DiffTotals;
  change_categories: Record<string, number>;
  most_modified_files: MostModifiedFile[];
  files: DiffReport[];
  failed_files?: FailedFileDiff[];
}

/** One row of a two-column original | modernized view */
export interface SideBySideRow {
  kind: OpcodeKind;

  /** Original line, or null for a blank cell */
  left: string | null;

  /** Modernized line, or null for a blank cell */
  right: string | null;
}

/** Text accepted by the engine: already-decoded text or UTF-8 bytes */
export type DiffInput = string | Uint8Array;

/** Configuration for the diff engine */
export interface DiffEngineConfig {
  /** Context lines around each hunk of the unified patch (default: 3) */
  contextLines: number;

  /** Number of files kept in the most-modified ranking (default: 5) */
  topFiles: number;

  /** Namespace prefix that marks legacy code (default: javax.) */
  legacyNamespace: string;

  /** Namespace prefix that marks migrated code (default: jakarta.) */
  targetNamespace: string;

  /** Label prefix for the original side of the patch */
  originalLabel: string;

  /** Label prefix for the modernized side of the patch */
  modernizedLabel: string;
}

/** Default diff engine configuration */
export const DEFAULT_DIFF_ENGINE_CONFIG: DiffEngineConfig = {
  contextLines: 3,
  topFiles: 5,
  legacyNamespace: 'javax.',
  targetNamespace: 'jakarta.',
  originalLabel: 'original',
  modernizedLabel: 'modernized',
};
