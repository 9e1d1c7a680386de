/**
 * Changed-section extraction from a line alignment.
 */

import { alignSequences } from './alignment.js';
import type { ClassificationRule } from './classify.js';
import { categorizeChange, DEFAULT_CLASSIFICATION_RULES } from './classify.js';
import type { ChangedSection, Opcode } from './types.js';

/**
 * Build a ChangedSection for every non-equal opcode, in alignment order.
 * Sections whose trimmed slices are both empty (whitespace-only changes)
 * are dropped.
 *
 * @param opcodes - Alignment of the two line sequences; computed when omitted
 */
export function extractChangedSections(
  originalLines: readonly string[],
  modernizedLines: readonly string[],
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
  opcodes: readonly Opcode[] = alignSequences(originalLines, modernizedLines),
): ChangedSection[] {
  const sections: ChangedSection[] = [];

  for (const code of opcodes) {
    if (code.kind === 'equal') continue;
    const [i1, i2] = code.origin;
    const [j1, j2] = code.target;
    const original = originalLines.slice(i1, i2).join('');
    const modernized = modernizedLines.slice(j1, j2).join('');
    const originalCode = original.trim();
    const modernizedCode = modernized.trim();
    if (originalCode === '' && modernizedCode === '') continue;

    sections.push({
      type: code.kind,
      original_start: i1 + 1,
      original_end: i2,
      modernized_start: j1 + 1,
      modernized_end: j2,
      original_code: originalCode,
      modernized_code: modernizedCode,
      change_type: categorizeChange(original, modernized, rules),
    });
  }

  return sections;
}
