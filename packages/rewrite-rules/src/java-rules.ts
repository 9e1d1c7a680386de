/**
 * Java source rules: javax to jakarta imports and retired Spring Cloud
 * annotations. A comment header is prepended to files that changed.
 */

import { applyRules } from './apply-rules.js';
import type { RewriteResult, RewriteRule } from './types.js';

export const JAVA_HEADER_MARKER = 'MODERNIZED BY LIFTKIT';

export const JAVA_RULES: readonly RewriteRule[] = [
  {
    id: 'java.javax-to-jakarta',
    description: 'Migrated javax.* imports to jakarta.*',
    pattern: /import\s+javax\./g,
    replacement: 'import jakarta.',
  },
  {
    id: 'java.enable-eureka-client',
    description: 'Commented out @EnableEurekaClient (enabled by default in Spring Cloud 2020+)',
    // Only uncommented annotations at the start of a line
    pattern: /^([ \t]*)@EnableEurekaClient\b/gm,
    replacement: '$1// @EnableEurekaClient - Enabled by default in Spring Cloud 2020+',
    when: (content) => content.includes('org.springframework'),
  },
];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function buildJavaHeader(generatedAt: Date): string {
  return [
    '/*',
    ` * ${JAVA_HEADER_MARKER}`,
    ' *',
    ' * Upgrades applied:',
    ' * - Target Java version: 21',
    ' * - Target Spring Boot: 3.x',
    ' * - Namespace: javax.* -> jakarta.*',
    ' *',
    ' * Still worth a manual pass:',
    ' * - Records, sealed classes and pattern matching',
    ' * - Dependency versions in pom.xml or build.gradle',
    ' * - Anonymous inner classes that could be lambdas',
    ' *',
    ` * Generated: ${formatTimestamp(generatedAt)}`,
    ' */',
    '',
  ].join('\n');
}

/**
 * Apply the Java table; a changed file gets the header block followed by a
 * blank line.
 */
export function modernizeJavaSource(content: string, clock: () => Date = () => new Date()): RewriteResult {
  const result = applyRules(content, JAVA_RULES);
  if (!result.changed || result.content.includes(JAVA_HEADER_MARKER)) return result;
  return { ...result, content: `${buildJavaHeader(clock())}\n${result.content}` };
}
