/**
 * Ordered rule application.
 *
 * Each rule sees the output of the rules before it; a rule that alters the
 * content records its description.
 */

import type { RewriteResult, RewriteRule } from './types.js';

function applyRule(content: string, rule: RewriteRule): string {
  const { pattern, replacement } = rule;
  return typeof replacement === 'string'
    ? content.replace(pattern, replacement)
    : content.replace(pattern, replacement);
}

/**
 * Apply rules in table order.
 */
export function applyRules(content: string, rules: readonly RewriteRule[]): RewriteResult {
  let current = content;
  const changes: string[] = [];

  for (const rule of rules) {
    if (rule.when && !rule.when(current)) continue;
    // search() ignores lastIndex and the g flag
    if (current.search(rule.pattern) === -1) continue;
    const next = applyRule(current, rule);
    if (next === current) continue;
    current = next;
    changes.push(rule.description);
  }

  return { content: current, changes, changed: current !== content };
}
