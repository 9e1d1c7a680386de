/**
 * Path and file name checks for user-supplied input.
 */

import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { isAbsolute, normalize, resolve, sep } from 'node:path';
import { ProjectPathError } from '../errors.js';
import type { PathValidation } from '../types.js';

export const MAX_PATH_LENGTH = 4096;

const MAX_FILENAME_LENGTH = 255;

const CONTROL_CHARS = /[\x00-\x1f]/;
const CONTROL_CHARS_GLOBAL = /[\x00-\x1f]/g;

function hasParentSegment(path: string): boolean {
  return path.split(/[\\/]/).includes('..');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Validate a project directory: non-empty, bounded length, no `..`
 * segments or control characters, absolute, an existing readable directory.
 */
export async function validateProjectPath(projectPath: string): Promise<PathValidation> {
  if (!projectPath) {
    return { valid: false, error: 'Project path cannot be empty' };
  }

  if (projectPath.length > MAX_PATH_LENGTH) {
    return {
      valid: false,
      error: `Project path exceeds maximum length of ${MAX_PATH_LENGTH} characters`,
    };
  }

  if (hasParentSegment(projectPath)) {
    return { valid: false, error: 'Project path must not contain parent directory segments (..)' };
  }

  if (CONTROL_CHARS.test(projectPath)) {
    return { valid: false, error: 'Project path contains control characters' };
  }

  if (!isAbsolute(projectPath)) {
    return { valid: false, error: 'Project path must be an absolute path' };
  }

  const normalized = normalize(projectPath);
  try {
    const info = await stat(normalized);
    if (!info.isDirectory()) {
      return { valid: false, error: `Project path is not a directory: ${normalized}` };
    }
    await access(normalized, constants.R_OK);
  } catch (err) {
    if (isMissingFile(err)) {
      return { valid: false, error: `Project path does not exist: ${normalized}` };
    }
    return {
      valid: false,
      error: `Project path is not readable: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  return { valid: true };
}

/**
 * Validate a project path and throw ProjectPathError when it is unusable.
 */
export async function assertProjectPath(projectPath: string): Promise<string> {
  const result = await validateProjectPath(projectPath);
  if (!result.valid) {
    throw new ProjectPathError(projectPath, result.error ?? 'Invalid project path');
  }
  return normalize(projectPath);
}

/**
 * Check that an output path lies inside (or equals) a base directory.
 */
export function validateOutputPath(basePath: string, outputPath: string): PathValidation {
  if (!outputPath) {
    return { valid: false, error: 'Output path cannot be empty' };
  }

  const base = resolve(basePath);
  const output = resolve(basePath, outputPath);
  const prefix = base.endsWith(sep) ? base : base + sep;

  if (output !== base && !output.startsWith(prefix)) {
    return { valid: false, error: 'Output path must be within the target directory' };
  }

  return { valid: true };
}

/**
 * Make a string safe to use as a single file name.
 */
export function sanitizeFilename(name: string): string {
  let cleaned = name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(CONTROL_CHARS_GLOBAL, '')
    .replace(/\.{2,}/g, '_')
    .replace(/^[ .]+|[ .]+$/g, '');

  if (!cleaned) {
    cleaned = 'sanitized_file';
  }

  return cleaned.slice(0, MAX_FILENAME_LENGTH);
}
