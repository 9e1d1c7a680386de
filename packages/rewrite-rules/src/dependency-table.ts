/**
 * Bundled dependency version tables.
 *
 * Loaded once from data/dependency-versions.json and validated with zod.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RuleTableError } from './errors.js';
import type { DependencyTable } from './types.js';

const version = z.string().regex(/^[0-9][0-9A-Za-z.\-]*$/, 'Invalid version');

export const DependencyTableSchema = z.object({
  targets: z.object({
    java: version,
    springBoot: version,
    springBootMavenPlugin: version,
    mavenCompilerPlugin: version,
    mavenSurefirePlugin: version,
    sourceEncoding: z.string().min(1),
  }),
  maven: z.record(z.string().min(1), version),
  gradle: z.record(z.string().regex(/^[^:\s]+:[^:\s]+$/, 'Expected group:name'), version),
});

const TABLE_URL = new URL('../data/dependency-versions.json', import.meta.url);

let cached: DependencyTable | null = null;

/**
 * Validate a raw table.
 *
 * @throws RuleTableError listing every schema violation
 */
export function parseDependencyTable(raw: unknown): DependencyTable {
  const result = DependencyTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new RuleTableError('Dependency version table is invalid', issues);
  }
  return result.data;
}

/**
 * The bundled table, read on first use.
 *
 * @throws RuleTableError when the file is unreadable or invalid
 */
export function loadDependencyTable(): DependencyTable {
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
  } catch (err) {
    throw new RuleTableError(
      `Cannot read dependency version table: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  cached = parseDependencyTable(raw);
  return cached;
}
