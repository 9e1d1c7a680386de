/**
 * Spring Boot property tables shared by the properties rules and the
 * configuration analyzer.
 */

import { applyRules } from './apply-rules.js';
import { escapeRegExp } from './maven-rules.js';
import type { RewriteResult, RewriteRule } from './types.js';

/** Keys renamed in Spring Boot 3 */
export const PROPERTY_RENAMES: Readonly<Record<string, string>> = {
  'spring.resources.static-locations': 'spring.web.resources.static-locations',
  'spring.jpa.properties.hibernate.dialect': 'spring.jpa.database-platform',
};

/** Keys that are obsolete or discouraged in Spring Boot 3, with advice */
export const DEPRECATED_PROPERTIES: Readonly<Record<string, string>> = {
  'spring.jpa.properties.hibernate.jdbc.lob.non_contextual_creation':
    'No longer needed in Spring Boot 3.x',
  'spring.jpa.properties.hibernate.enable_lazy_load_no_trans':
    'Use spring.jpa.open-in-view instead',
  'spring.datasource.hikari.maximum-pool-size':
    'Consider using spring.datasource.hikari.pool-name',
};

export const PROPERTIES_RULES: readonly RewriteRule[] = Object.entries(PROPERTY_RENAMES).map(
  ([from, to]) => ({
    id: `properties.rename.${from}`,
    description: `Migrated property '${from}' to '${to}'`,
    // Key at the start of a line, followed by = or :
    pattern: new RegExp(`^([ \\t]*)${escapeRegExp(from)}(?=[ \\t]*[=:])`, 'gm'),
    replacement: (_match: string, indent: string) => `${indent}${to}`,
  }),
);

export function modernizeProperties(content: string): RewriteResult {
  return applyRules(content, PROPERTIES_RULES);
}
