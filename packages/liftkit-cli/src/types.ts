/**
 * Types for the liftkit CLI.
 */

import type { ProjectDiffSummary, SideBySideRow } from '@liftkit/diff-engine';
import type { ModernizedFileKind } from '@liftkit/rewrite-rules';

/** pino level names accepted by the CLI */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/** Configuration for the CLI and the project walker */
export interface CliConfig {
  /** Log level (default: info) */
  logLevel: LogLevel;

  /** Pretty-print log lines instead of JSON (default: false) */
  logPretty: boolean;

  /** Context lines around each patch hunk (default: 3) */
  contextLines: number;

  /** Files kept in the most-modified ranking (default: 5) */
  topFiles: number;

  /** Directory names skipped while walking a project */
  ignoredDirs: string[];

  /** Suffix of the output directory created next to the project (default: _modernized) */
  outputSuffix: string;

  /** Files processed at the same time (default: 8) */
  maxConcurrentFiles: number;

  /** Namespace prefix that marks legacy code (default: javax.) */
  legacyNamespace: string;

  /** Namespace prefix that marks migrated code (default: jakarta.) */
  targetNamespace: string;
}

/** Directory names skipped by default */
export const DEFAULT_IGNORED_DIRS: readonly string[] = [
  '.git',
  '.gradle',
  '.idea',
  '.mvn',
  '.vscode',
  'build',
  'node_modules',
  'out',
  'target',
];

/** Default CLI configuration */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  logLevel: 'info',
  logPretty: false,
  contextLines: 3,
  topFiles: 5,
  ignoredDirs: [...DEFAULT_IGNORED_DIRS],
  outputSuffix: '_modernized',
  maxConcurrentFiles: 8,
  legacyNamespace: 'javax.',
  targetNamespace: 'jakarta.',
};

/** Result of a path check */
export interface PathValidation {
  valid: boolean;
  error?: string;
}

/** What happened to one file during a scan */
export interface FileScanRecord {
  /** Path relative to the project root, forward slashes */
  relativePath: string;

  kind: ModernizedFileKind;

  /** Rule descriptions that altered the file */
  changes: string[];

  /** Set when the file could not be processed */
  error?: string;
}

/** Outcome of scanning one project */
export interface ScanResult {
  projectPath: string;
  outputPath: string;
  files: FileScanRecord[];
  summary: ProjectDiffSummary;

  /** Side-by-side rows of every file the rules changed, keyed by relative path */
  sideBySide: Map<string, SideBySideRow[]>;
}

/** Outcome of one project in a batch */
export type BatchEntry =
  | { project: string; status: 'success'; outputPath: string; filesModified: number }
  | { project: string; status: 'failed'; error: string };

/** Totals of a batch run */
export interface BatchReport {
  totalProjects: number;
  successful: number;
  failed: number;
  durationMs: number;
  results: BatchEntry[];
}
