/**
 * Sequence alignment.
 *
 * Myers' O((N+M)D) algorithm finds a shortest edit script between two
 * sequences, which is the same as a longest common subsequence. Common
 * prefixes and suffixes are matched up front; the middle is searched with a
 * trace of furthest-reaching paths and then walked backwards.
 *
 * When two paths reach equally far, the deletion wins. The original sequence
 * is therefore consumed at its lowest index first, and identical input always
 * yields the same alignment.
 *
 * See "An O(ND) Difference Algorithm and Its Variations", Myers 1986.
 */

import type { Opcode } from './types.js';

/** Equality test over sequence tokens */
export type TokenEquals<T> = (left: T, right: T) => boolean;

/** A run of matched tokens: a[originStart..+size) equals b[targetStart..+size) */
export interface MatchingBlock {
  originStart: number;
  targetStart: number;
  size: number;
}

const strictEquals = <T>(left: T, right: T): boolean => left === right;

interface Window {
  aLo: number;
  aHi: number;
  bLo: number;
  bHi: number;
}

function trimCommon<T>(
  a: readonly T[],
  b: readonly T[],
  eq: TokenEquals<T>,
): { prefix: number; suffix: number } {
  const n = a.length;
  const m = b.length;
  let prefix = 0;
  while (prefix < n && prefix < m && eq(a[prefix], b[prefix])) {
    prefix += 1;
  }
  let suffix = 0;
  while (
    suffix < n - prefix &&
    suffix < m - prefix &&
    eq(a[n - 1 - suffix], b[m - 1 - suffix])
  ) {
    suffix += 1;
  }
  return { prefix, suffix };
}

/**
 * Walk diagonals inside the window and return, per depth, the
 * furthest-reaching x for every diagonal k in [-d, d].
 */
function forwardTrace<T>(
  a: readonly T[],
  b: readonly T[],
  window: Window,
  eq: TokenEquals<T>,
): Int32Array[] {
  const n = window.aHi - window.aLo;
  const m = window.bHi - window.bLo;
  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  v[offset + 1] = 0;
  const trace: Int32Array[] = [];

  for (let d = 0; d <= max; d += 1) {
    const snapshot = new Int32Array(2 * d + 1);
    for (let k = -d; k <= d; k += 2) {
      const down = k === -d || (k !== d && (v[offset + k - 1] ?? 0) < (v[offset + k + 1] ?? 0));
      let x = down ? (v[offset + k + 1] ?? 0) : (v[offset + k - 1] ?? 0) + 1;
      let y = x - k;
      while (x < n && y < m && eq(a[window.aLo + x], b[window.bLo + y])) {
        x += 1;
        y += 1;
      }
      v[offset + k] = x;
      snapshot[k + d] = x;
      if (x >= n && y >= m) {
        trace.push(snapshot);
        return trace;
      }
    }
    trace.push(snapshot);
  }
  return trace;
}

/**
 * Recover matched index pairs (window-relative) from a forward trace.
 */
function backtrack(trace: Int32Array[], n: number, m: number): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  let x = n;
  let y = m;

  for (let d = trace.length - 1; d > 0; d -= 1) {
    const prev = trace[d - 1];
    const base = d - 1;
    const k = x - y;
    const down =
      k === -d || (k !== d && (prev[k - 1 + base] ?? 0) < (prev[k + 1 + base] ?? 0));
    const prevK = down ? k + 1 : k - 1;
    const prevX = prev[prevK + base] ?? 0;
    const prevY = prevX - prevK;
    const snakeStartX = down ? prevX : prevX + 1;

    while (x > snakeStartX) {
      x -= 1;
      y -= 1;
      pairs.push([x, y]);
    }
    x = prevX;
    y = prevY;
  }

  while (x > 0 && y > 0) {
    x -= 1;
    y -= 1;
    pairs.push([x, y]);
  }

  return pairs.reverse();
}

/**
 * Compute the maximal runs of matched tokens between two sequences,
 * in increasing order, followed by a zero-size sentinel at (a.length, b.length).
 */
export function matchingBlocks<T>(
  a: readonly T[],
  b: readonly T[],
  eq: TokenEquals<T> = strictEquals,
): MatchingBlock[] {
  const n = a.length;
  const m = b.length;
  const { prefix, suffix } = trimCommon(a, b, eq);
  const window: Window = { aLo: prefix, aHi: n - suffix, bLo: prefix, bHi: m - suffix };

  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < prefix; i += 1) pairs.push([i, i]);

  const innerN = window.aHi - window.aLo;
  const innerM = window.bHi - window.bLo;
  if (innerN > 0 && innerM > 0) {
    const trace = forwardTrace(a, b, window, eq);
    for (const [x, y] of backtrack(trace, innerN, innerM)) {
      pairs.push([window.aLo + x, window.bLo + y]);
    }
  }

  for (let i = suffix; i > 0; i -= 1) pairs.push([n - i, m - i]);

  const blocks: MatchingBlock[] = [];
  for (const [ai, bi] of pairs) {
    const last = blocks[blocks.length - 1];
    if (last && last.originStart + last.size === ai && last.targetStart + last.size === bi) {
      last.size += 1;
    } else {
      blocks.push({ originStart: ai, targetStart: bi, size: 1 });
    }
  }
  blocks.push({ originStart: n, targetStart: m, size: 0 });
  return blocks;
}

/**
 * Align two sequences into opcodes.
 *
 * Unmatched tokens between two matched runs form a single opcode: replace
 * when both sides are non-empty, otherwise delete or insert. The opcode
 * ranges cover [0, a.length) and [0, b.length) without gaps or overlaps.
 */
export function alignSequences<T>(
  a: readonly T[],
  b: readonly T[],
  eq: TokenEquals<T> = strictEquals,
): Opcode[] {
  const opcodes: Opcode[] = [];
  let i = 0;
  let j = 0;

  for (const block of matchingBlocks(a, b, eq)) {
    const ai = block.originStart;
    const bj = block.targetStart;
    if (i < ai && j < bj) {
      opcodes.push({ kind: 'replace', origin: [i, ai], target: [j, bj] });
    } else if (i < ai) {
      opcodes.push({ kind: 'delete', origin: [i, ai], target: [j, j] });
    } else if (j < bj) {
      opcodes.push({ kind: 'insert', origin: [i, i], target: [j, bj] });
    }
    i = ai + block.size;
    j = bj + block.size;
    if (block.size > 0) {
      opcodes.push({ kind: 'equal', origin: [ai, i], target: [bj, j] });
    }
  }

  return opcodes;
}

/**
 * Length of the shortest edit script (insertions + deletions) between two
 * sequences. Keeps a single row of furthest-reaching paths, so memory stays
 * linear in the input length.
 */
export function editDistance<T>(
  a: readonly T[],
  b: readonly T[],
  eq: TokenEquals<T> = strictEquals,
): number {
  const { prefix, suffix } = trimCommon(a, b, eq);
  const aLo = prefix;
  const bLo = prefix;
  const n = a.length - suffix - prefix;
  const m = b.length - suffix - prefix;
  if (n === 0 || m === 0) return n + m;

  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  v[offset + 1] = 0;

  for (let d = 0; d <= max; d += 1) {
    for (let k = -d; k <= d; k += 2) {
      const down = k === -d || (k !== d && (v[offset + k - 1] ?? 0) < (v[offset + k + 1] ?? 0));
      let x = down ? (v[offset + k + 1] ?? 0) : (v[offset + k - 1] ?? 0) + 1;
      let y = x - k;
      while (x < n && y < m && eq(a[aLo + x], b[bLo + y])) {
        x += 1;
        y += 1;
      }
      v[offset + k] = x;
      if (x >= n && y >= m) return d;
    }
  }
  return max;
}

/**
 * Number of tokens matched by a longest common subsequence.
 */
export function matchedCount<T>(
  a: readonly T[],
  b: readonly T[],
  eq: TokenEquals<T> = strictEquals,
): number {
  return (a.length + b.length - editDistance(a, b, eq)) / 2;
}
