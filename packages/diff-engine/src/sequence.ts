/**
 * Token sequences for comparison.
 *
 * Lines keep their terminators, so joining the split sequence gives back the
 * exact input text.
 */

import { MalformedInputError } from './errors.js';
import type { DiffInput } from './types.js';

const LINE_PATTERN = /[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g;
const TERMINATOR_PATTERN = /(?:\r\n|\n|\r)$/;

/**
 * Split text into lines, keeping each line's terminator (\r\n, \n or \r).
 * A trailing fragment without a terminator is its own line.
 */
export function splitLines(text: string): string[] {
  return text.match(LINE_PATTERN) ?? [];
}

/**
 * Split text into lines without terminators.
 */
export function splitLinesBare(text: string): string[] {
  return splitLines(text).map(stripTerminator);
}

/** Remove the line terminator from a single line */
export function stripTerminator(line: string): string {
  return line.replace(TERMINATOR_PATTERN, '');
}

/** Whether a line carries a terminator */
export function hasTerminator(line: string): boolean {
  return TERMINATOR_PATTERN.test(line);
}

/**
 * Split text into characters (Unicode code points).
 */
export function splitChars(text: string): string[] {
  return Array.from(text);
}

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Turn engine input into text. Strings pass through; bytes must be valid UTF-8.
 *
 * @throws MalformedInputError when the bytes are not valid UTF-8
 */
export function decodeText(input: DiffInput, identifier: string): string {
  if (typeof input === 'string') return input;
  try {
    return decoder.decode(input);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(identifier, `Cannot decode ${identifier} as UTF-8: ${reason}`);
  }
}
