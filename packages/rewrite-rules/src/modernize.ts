/**
 * Per-file dispatch to the rule tables.
 */

import { posix } from 'node:path';
import { loadDependencyTable } from './dependency-table.js';
import { modernizeGradle } from './gradle-rules.js';
import { modernizeJavaSource } from './java-rules.js';
import { modernizePom } from './maven-rules.js';
import { modernizeProperties } from './properties-rules.js';
import type { ModernizedFile, ModernizedFileKind, ModernizeOptions } from './types.js';

/** Classify a file by its name */
export function detectFileKind(relativePath: string): ModernizedFileKind {
  const name = posix.basename(relativePath.split('\\').join('/'));
  if (name.endsWith('.java')) return 'java';
  if (name === 'pom.xml') return 'maven';
  if (name === 'build.gradle') return 'gradle';
  if (name === 'application.properties') return 'properties';
  return 'other';
}

/**
 * Apply the rule table matching the file name. Files of kind `other` come
 * back unchanged.
 *
 * @throws RuleTableError when a build file needs the bundled table and it is invalid
 */
export function modernizeFile(
  relativePath: string,
  content: string,
  options: ModernizeOptions = {},
): ModernizedFile {
  const kind = detectFileKind(relativePath);
  switch (kind) {
    case 'java':
      return { kind, ...modernizeJavaSource(content, options.clock) };
    case 'maven':
      return { kind, ...modernizePom(content, loadDependencyTable()) };
    case 'gradle':
      return { kind, ...modernizeGradle(content, loadDependencyTable()) };
    case 'properties':
      return { kind, ...modernizeProperties(content) };
    case 'other':
      return { kind, content, changes: [], changed: false };
  }
}
