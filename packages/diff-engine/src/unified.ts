/**
 * Unified patch formatting.
 *
 * Hunks are built the classic way: opcodes are grouped so that each hunk
 * carries up to `contextLines` equal lines on either side, and equal runs
 * longer than twice the context split the patch into separate hunks.
 */

import { hasTerminator } from './sequence.js';
import type { Opcode } from './types.js';

const NO_NEWLINE_MARKER = '\\ No newline at end of file\n';

/** Labels for the patch headers */
export interface UnifiedDiffLabels {
  originalLabel: string;
  modernizedLabel: string;
}

/**
 * Group opcodes into hunks with at most `context` equal lines around changes.
 * Returns no groups when the sequences are identical.
 */
export function groupOpcodes(opcodes: readonly Opcode[], context: number): Opcode[][] {
  const codes: Opcode[] = opcodes.length > 0
    ? [...opcodes]
    : [{ kind: 'equal', origin: [0, 1], target: [0, 1] }];

  const first = codes[0];
  if (first && first.kind === 'equal') {
    const [i1, i2] = first.origin;
    const [j1, j2] = first.target;
    codes[0] = {
      kind: 'equal',
      origin: [Math.max(i1, i2 - context), i2],
      target: [Math.max(j1, j2 - context), j2],
    };
  }
  const lastIndex = codes.length - 1;
  const last = codes[lastIndex];
  if (last && last.kind === 'equal') {
    const [i1, i2] = last.origin;
    const [j1, j2] = last.target;
    codes[lastIndex] = {
      kind: 'equal',
      origin: [i1, Math.min(i2, i1 + context)],
      target: [j1, Math.min(j2, j1 + context)],
    };
  }

  const groups: Opcode[][] = [];
  let group: Opcode[] = [];
  for (const code of codes) {
    let [i1, i2] = code.origin;
    let [j1, j2] = code.target;
    if (code.kind === 'equal' && i2 - i1 > context * 2) {
      group.push({
        kind: 'equal',
        origin: [i1, Math.min(i2, i1 + context)],
        target: [j1, Math.min(j2, j1 + context)],
      });
      groups.push(group);
      group = [];
      i1 = Math.max(i1, i2 - context);
      j1 = Math.max(j1, j2 - context);
    }
    group.push({ kind: code.kind, origin: [i1, i2], target: [j1, j2] });
  }

  const only = group[0];
  if (group.length > 0 && !(group.length === 1 && only?.kind === 'equal')) {
    groups.push(group);
  }
  return groups;
}

/**
 * Format a hunk range: a single line prints its 1-based start, an empty
 * range prints the line before it with length 0.
 */
export function formatRange(start: number, end: number): string {
  const length = end - start;
  const beginning = start + 1;
  if (length === 1) return `${beginning}`;
  if (length === 0) return `${beginning - 1},0`;
  return `${beginning},${length}`;
}

function emitLine(prefix: string, line: string): string {
  return hasTerminator(line) ? `${prefix}${line}` : `${prefix}${line}\n${NO_NEWLINE_MARKER}`;
}

/**
 * Render a unified patch for two line sequences (lines keep terminators).
 * Identical sequences give an empty string.
 */
export function formatUnifiedDiff(
  originalLines: readonly string[],
  modernizedLines: readonly string[],
  opcodes: readonly Opcode[],
  name: string,
  contextLines: number,
  labels: UnifiedDiffLabels,
): string {
  const groups = groupOpcodes(opcodes, contextLines);
  if (groups.length === 0) return '';

  const out: string[] = [
    `--- ${labels.originalLabel}/${name}\n`,
    `+++ ${labels.modernizedLabel}/${name}\n`,
  ];

  for (const group of groups) {
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last) continue;
    const originRange = formatRange(first.origin[0], last.origin[1]);
    const targetRange = formatRange(first.target[0], last.target[1]);
    out.push(`@@ -${originRange} +${targetRange} @@\n`);

    for (const code of group) {
      const [i1, i2] = code.origin;
      const [j1, j2] = code.target;
      if (code.kind === 'equal') {
        for (const line of originalLines.slice(i1, i2)) out.push(emitLine(' ', line));
        continue;
      }
      if (code.kind === 'replace' || code.kind === 'delete') {
        for (const line of originalLines.slice(i1, i2)) out.push(emitLine('-', line));
      }
      if (code.kind === 'replace' || code.kind === 'insert') {
        for (const line of modernizedLines.slice(j1, j2)) out.push(emitLine('+', line));
      }
    }
  }

  return out.join('');
}
