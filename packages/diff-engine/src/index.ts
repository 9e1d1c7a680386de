/**
 * @liftkit/diff-engine
 *
 * Line and character alignment of original and rewritten files, with
 * change classification, unified patches and project-level summaries.
 */

// Types
export type {
  OpcodeKind,
  IndexRange,
  Opcode,
  ChangeCategory,
  ChangedSection,
  DiffReport,
  FailedFileDiff,
  FileDiffOutcome,
  DiffTotals,
  MostModifiedFile,
  ProjectDiffSummary,
  DiffReportDocument,
  SideBySideRow,
  DiffInput,
  DiffEngineConfig,
} from './types.js';
export { DEFAULT_DIFF_ENGINE_CONFIG } from './types.js';

// Errors
export { MalformedInputError } from './errors.js';
export type { DiffEngineErrorCode } from './errors.js';

// Engine
export { SequenceDiffEngine } from './engine.js';

// Building blocks
export { splitLines, splitLinesBare, splitChars, stripTerminator, hasTerminator, decodeText } from './sequence.js';
export { alignSequences, matchingBlocks, editDistance, matchedCount } from './alignment.js';
export type { TokenEquals, MatchingBlock } from './alignment.js';
export { similarityRatio, roundRatio } from './similarity.js';
export { formatUnifiedDiff, formatRange, groupOpcodes } from './unified.js';
export type { UnifiedDiffLabels } from './unified.js';
export {
  categorizeChange,
  createClassificationRules,
  DEFAULT_CLASSIFICATION_RULES,
  FALLBACK_CATEGORY,
} from './classify.js';
export type { ClassificationRule } from './classify.js';
export { extractChangedSections } from './sections.js';
export { summarize, summarizeOutcomes } from './summary.js';
export { buildSideBySideRows, renderSideBySideHtml, escapeHtml } from './side-by-side.js';
export { toReportDocument, serializeReport, exportDiffReportJson } from './export.js';
