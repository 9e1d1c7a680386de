import { describe, it, expect } from 'vitest';
import { alignSequences } from '../alignment.js';
import { splitLines } from '../sequence.js';
import { formatRange, formatUnifiedDiff, groupOpcodes } from '../unified.js';

const labels = { originalLabel: 'original', modernizedLabel: 'modernized' };

function patch(original: string, modernized: string, context = 3): string {
  const a = splitLines(original);
  const b = splitLines(modernized);
  return formatUnifiedDiff(a, b, alignSequences(a, b), 'f.txt', context, labels);
}

describe('formatRange', () => {
  it('prints only the start of a single-line range', () => {
    expect(formatRange(4, 5)).toBe('5');
  });

  it('prints the preceding line for an empty range', () => {
    expect(formatRange(0, 0)).toBe('0,0');
    expect(formatRange(3, 3)).toBe('3,0');
  });

  it('prints start and length otherwise', () => {
    expect(formatRange(0, 3)).toBe('1,3');
  });
});

describe('groupOpcodes', () => {
  it('returns no hunks for identical sequences', () => {
    expect(groupOpcodes(alignSequences(['a', 'b'], ['a', 'b']), 3)).toEqual([]);
    expect(groupOpcodes([], 3)).toEqual([]);
  });
});

describe('formatUnifiedDiff', () => {
  it('is empty for identical text', () => {
    expect(patch('a\nb\n', 'a\nb\n')).toBe('');
  });

  it('renders an insertion into empty text', () => {
    expect(patch('', 'a\n')).toBe(
      '--- original/f.txt\n+++ modernized/f.txt\n@@ -0,0 +1 @@\n+a\n',
    );
  });

  it('renders a deletion of all text', () => {
    expect(patch('a\nb\n', '')).toBe(
      '--- original/f.txt\n+++ modernized/f.txt\n@@ -1,2 +0,0 @@\n-a\n-b\n',
    );
  });

  it('marks lines without a trailing newline', () => {
    expect(patch('a\nb', 'a\nc')).toBe(
      '--- original/f.txt\n' +
        '+++ modernized/f.txt\n' +
        '@@ -1,2 +1,2 @@\n' +
        ' a\n' +
        '-b\n' +
        '\\ No newline at end of file\n' +
        '+c\n' +
        '\\ No newline at end of file\n',
    );
  });

  it('splits distant changes into separate hunks', () => {
    const original = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'].map((l) => `${l}\n`).join('');
    const modernized = original.replace('1\n', 'one\n').replace('10\n', 'ten\n');

    expect(patch(original, modernized)).toBe(
      '--- original/f.txt\n' +
        '+++ modernized/f.txt\n' +
        '@@ -1,4 +1,4 @@\n' +
        '-1\n' +
        '+one\n' +
        ' 2\n' +
        ' 3\n' +
        ' 4\n' +
        '@@ -7,4 +7,4 @@\n' +
        ' 7\n' +
        ' 8\n' +
        ' 9\n' +
        '-10\n' +
        '+ten\n',
    );
  });

  it('honours a smaller context', () => {
    expect(patch('a\nb\nc\nd\ne\n', 'a\nb\nX\nd\ne\n', 1)).toBe(
      '--- original/f.txt\n' +
        '+++ modernized/f.txt\n' +
        '@@ -2,3 +2,3 @@\n' +
        ' b\n' +
        '-c\n' +
        '+X\n' +
        ' d\n',
    );
  });
});
