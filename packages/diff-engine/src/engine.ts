/**
 * Sequence diff engine.
 *
 * Compares an original text with its rewritten counterpart and produces a
 * DiffReport: line counts, added/removed lines, a character-level similarity
 * ratio, a unified patch and classified changed sections. The engine holds no
 * state between calls, so reports may be computed concurrently.
 */

import type { Logger } from 'pino';
import { alignSequences } from './alignment.js';
import type { ClassificationRule } from './classify.js';
import { createClassificationRules } from './classify.js';
import { extractChangedSections } from './sections.js';
import { decodeText, splitLines } from './sequence.js';
import { buildSideBySideRows } from './side-by-side.js';
import { similarityRatio } from './similarity.js';
import { summarize, summarizeOutcomes } from './summary.js';
import type {
  ChangedSection,
  DiffEngineConfig,
  DiffInput,
  DiffReport,
  FileDiffOutcome,
  ProjectDiffSummary,
  SideBySideRow,
} from './types.js';
import { DEFAULT_DIFF_ENGINE_CONFIG } from './types.js';
import { formatUnifiedDiff } from './unified.js';

export class SequenceDiffEngine {
  private readonly config: DiffEngineConfig;
  private readonly logger: Logger;
  private readonly rules: readonly ClassificationRule[];

  constructor(
    logger: Logger,
    config?: Partial<DiffEngineConfig>,
    rules?: readonly ClassificationRule[],
  ) {
    this.config = { ...DEFAULT_DIFF_ENGINE_CONFIG, ...config };
    this.logger = logger.child({ component: 'diff-engine' });
    this.rules = rules ?? createClassificationRules(this.config);
  }

  /** Effective configuration */
  getConfig(): DiffEngineConfig {
    return { ...this.config };
  }

  /**
   * Compare two versions of a file.
   *
   * @param identifier - File name used in the report and the patch headers
   * @throws MalformedInputError when byte input is not valid UTF-8
   */
  compare(original: DiffInput, modernized: DiffInput, identifier: string): DiffReport {
    const originalText = decodeText(original, `${this.config.originalLabel}/${identifier}`);
    const modernizedText = decodeText(modernized, `${this.config.modernizedLabel}/${identifier}`);

    const originalLines = splitLines(originalText);
    const modernizedLines = splitLines(modernizedText);
    const opcodes = alignSequences(originalLines, modernizedLines);

    let added = 0;
    let removed = 0;
    for (const code of opcodes) {
      if (code.kind === 'insert' || code.kind === 'replace') {
        added += code.target[1] - code.target[0];
      }
      if (code.kind === 'delete' || code.kind === 'replace') {
        removed += code.origin[1] - code.origin[0];
      }
    }

    const report: DiffReport = {
      filename: identifier,
      original_lines: originalLines.length,
      modernized_lines: modernizedLines.length,
      added_lines: added,
      removed_lines: removed,
      changed_lines: added + removed,
      diff_ratio: similarityRatio(originalText, modernizedText),
      unified_diff: formatUnifiedDiff(
        originalLines,
        modernizedLines,
        opcodes,
        identifier,
        this.config.contextLines,
        this.config,
      ),
      changed_sections: extractChangedSections(originalLines, modernizedLines, this.rules, opcodes),
    };

    this.logger.debug(
      {
        filename: identifier,
        added,
        removed,
        diffRatio: report.diff_ratio,
        sections: report.changed_sections.length,
      },
      'File compared'
    );

    return report;
  }

  /**
   * Changed sections between two line sequences, classified with this
   * engine's rules.
   */
  extractChangedSections(
    originalLines: readonly string[],
    modernizedLines: readonly string[],
  ): ChangedSection[] {
    return extractChangedSections(originalLines, modernizedLines, this.rules);
  }

  /** Aggregate reports in submission order */
  summarize(reports: readonly DiffReport[]): ProjectDiffSummary {
    const summary = summarize(reports, this.config.topFiles);
    this.logger.info(
      {
        files: summary.summary.total_files_analyzed,
        modified: summary.summary.total_files_modified,
        linesChanged: summary.summary.total_lines_changed,
      },
      'Project summary built'
    );
    return summary;
  }

  /** Aggregate reports and failures; failures are excluded from totals */
  summarizeOutcomes(outcomes: readonly FileDiffOutcome[]): ProjectDiffSummary {
    const summary = summarizeOutcomes(outcomes, this.config.topFiles);
    if (summary.failed_files.length > 0) {
      this.logger.warn(
        { failed: summary.failed_files.map((f) => f.filename) },
        'Files excluded from summary'
      );
    }
    this.logger.info(
      {
        files: summary.summary.total_files_analyzed,
        modified: summary.summary.total_files_modified,
        failed: summary.failed_files.length,
      },
      'Project summary built'
    );
    return summary;
  }

  /**
   * Side-by-side rows for two versions of a file.
   *
   * @throws MalformedInputError when byte input is not valid UTF-8
   */
  sideBySide(original: DiffInput, modernized: DiffInput, identifier: string): SideBySideRow[] {
    return buildSideBySideRows(
      decodeText(original, `${this.config.originalLabel}/${identifier}`),
      decodeText(modernized, `${this.config.modernizedLabel}/${identifier}`),
    );
  }
}
