/**
 * Change classification.
 *
 * An ordered table of (category, predicate) pairs, evaluated top to bottom
 * against the untrimmed original and modernized slices of a changed region.
 * The first matching rule wins; `code_updated` is the fallback. Matching is
 * plain substring search and therefore approximate.
 */

import type { ChangeCategory, DiffEngineConfig } from './types.js';
import { DEFAULT_DIFF_ENGINE_CONFIG } from './types.js';

/** One row of the classification table */
export interface ClassificationRule {
  category: ChangeCategory;
  matches: (original: string, modernized: string) => boolean;
}

/** Category used when no rule matches */
export const FALLBACK_CATEGORY: ChangeCategory = 'code_updated';

/**
 * Build the classification table for a namespace migration.
 */
export function createClassificationRules(
  config: Pick<DiffEngineConfig, 'legacyNamespace' | 'targetNamespace'>,
): ClassificationRule[] {
  const { legacyNamespace, targetNamespace } = config;
  return [
    {
      category: 'namespace_migration',
      matches: (original, modernized) =>
        original.includes(legacyNamespace) && modernized.includes(targetNamespace),
    },
    {
      category: 'import_added',
      matches: (original, modernized) =>
        modernized.includes('import') && !original.includes('import'),
    },
    {
      category: 'import_removed',
      matches: (original, modernized) =>
        original.includes('import') && !modernized.includes('import'),
    },
    {
      category: 'comment_added',
      matches: (original, modernized) => modernized.includes('//') && !original.includes('//'),
    },
    {
      category: 'deprecated_removed',
      matches: (original) => original.includes('Deprecated'),
    },
  ];
}

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] =
  createClassificationRules(DEFAULT_DIFF_ENGINE_CONFIG);

/**
 * Label a changed region with the first matching category.
 */
export function categorizeChange(
  original: string,
  modernized: string,
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): ChangeCategory {
  for (const rule of rules) {
    if (rule.matches(original, modernized)) return rule.category;
  }
  return FALLBACK_CATEGORY;
}
