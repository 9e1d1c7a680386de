/**
 * Two-column original | modernized view of a line alignment.
 */

import { alignSequences } from './alignment.js';
import { splitLinesBare } from './sequence.js';
import type { OpcodeKind, SideBySideRow } from './types.js';

const BLANK_BACKGROUND = '#fff';

const LEFT_BACKGROUND: Record<OpcodeKind, string> = {
  equal: '#fff',
  delete: '#ffcccc',
  insert: '#fff',
  replace: '#ffeecc',
};

const RIGHT_BACKGROUND: Record<OpcodeKind, string> = {
  equal: '#fff',
  delete: '#fff',
  insert: '#ccffcc',
  replace: '#eeffcc',
};

const CELL_STYLE = 'padding: 5px; border: 1px solid #ddd;';
const HEADER_STYLE = 'width: 50%; padding: 10px; border: 1px solid #ddd;';

/** Escape the five HTML-significant characters */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Align two texts line by line (terminators dropped) and lay the result out
 * as rows. Replaced regions are paired line by line; the shorter side is
 * padded with blank cells.
 */
export function buildSideBySideRows(original: string, modernized: string): SideBySideRow[] {
  const left = splitLinesBare(original);
  const right = splitLinesBare(modernized);
  const rows: SideBySideRow[] = [];

  for (const code of alignSequences(left, right)) {
    const [i1, i2] = code.origin;
    const [j1, j2] = code.target;
    switch (code.kind) {
      case 'equal':
        for (const line of left.slice(i1, i2)) rows.push({ kind: 'equal', left: line, right: line });
        break;
      case 'delete':
        for (const line of left.slice(i1, i2)) rows.push({ kind: 'delete', left: line, right: null });
        break;
      case 'insert':
        for (const line of right.slice(j1, j2)) rows.push({ kind: 'insert', left: null, right: line });
        break;
      case 'replace': {
        const height = Math.max(i2 - i1, j2 - j1);
        for (let offset = 0; offset < height; offset += 1) {
          const i = i1 + offset;
          const j = j1 + offset;
          rows.push({
            kind: 'replace',
            left: i < i2 ? (left[i] ?? null) : null,
            right: j < j2 ? (right[j] ?? null) : null,
          });
        }
        break;
      }
    }
  }

  return rows;
}

function renderCell(text: string | null, background: string): string {
  const color = text === null ? BLANK_BACKGROUND : background;
  return `<td style="${CELL_STYLE} background-color: ${color};">${escapeHtml(text ?? '')}</td>`;
}

/**
 * Render rows as an HTML table, one `<tr>` per line of output.
 */
export function renderSideBySideHtml(rows: readonly SideBySideRow[]): string {
  const lines = [
    '<table style="width:100%; border-collapse: collapse; font-family: monospace;">',
    '<tr style="background-color: #f0f0f0;">' +
      `<th style="${HEADER_STYLE}">Original</th>` +
      `<th style="${HEADER_STYLE}">Modernized</th></tr>`,
  ];
  for (const row of rows) {
    lines.push(
      `<tr>${renderCell(row.left, LEFT_BACKGROUND[row.kind])}${renderCell(row.right, RIGHT_BACKGROUND[row.kind])}</tr>`,
    );
  }
  lines.push('</table>');
  return lines.join('\n');
}
