/**
 * Gradle build.gradle rules.
 */

import { applyRules } from './apply-rules.js';
import { escapeRegExp } from './maven-rules.js';
import type { DependencyTable, RewriteResult, RewriteRule } from './types.js';

export const GRADLE_COMMENT_MARKER = 'MODERNIZED by liftkit';

const GRADLE_COMMENT = `// ${GRADLE_COMMENT_MARKER} - Updated to Java 21 and Spring Boot 3.x\n`;

function compatibilityRules(setting: string, java: string): RewriteRule[] {
  return [
    {
      id: `gradle.${setting}`,
      description: `Updated ${setting} to ${java}`,
      pattern: new RegExp(`${setting}\\s*=\\s*['"]?[\\d.]+['"]?`, 'g'),
      replacement: `${setting} = '${java}'`,
    },
    {
      id: `gradle.${setting}-java-version`,
      description: `Updated ${setting} to JavaVersion.VERSION_${java}`,
      pattern: new RegExp(`${setting}\\s*=\\s*JavaVersion\\.VERSION_[\\d_]+`, 'g'),
      replacement: `${setting} = JavaVersion.VERSION_${java}`,
    },
  ];
}

function coordinateRule(coordinate: string, version: string): RewriteRule {
  const name = coordinate.slice(coordinate.indexOf(':') + 1);
  return {
    id: `gradle.dependency.${coordinate}`,
    description: `Updated ${name} to ${version}`,
    pattern: new RegExp(`['"]?${escapeRegExp(coordinate)}:[^'"\\s]+['"]?`, 'g'),
    replacement: `'${coordinate}:${version}'`,
  };
}

export function createGradleRules(table: DependencyTable): RewriteRule[] {
  const { targets } = table;
  return [
    ...compatibilityRules('sourceCompatibility', targets.java),
    ...compatibilityRules('targetCompatibility', targets.java),
    {
      id: 'gradle.spring-boot-plugin',
      description: `Updated Spring Boot plugin to ${targets.springBoot}`,
      pattern: /(id\s+['"]org\.springframework\.boot['"]\s+version\s+)['"][\d.]+['"]/g,
      replacement: (_match, head: string) => `${head}'${targets.springBoot}'`,
    },
    ...Object.entries(table.gradle).map(([coordinate, version]) =>
      coordinateRule(coordinate, version),
    ),
  ];
}

/**
 * Apply the build.gradle table. A changed build file gets a comment line at
 * the top, once.
 */
export function modernizeGradle(content: string, table: DependencyTable): RewriteResult {
  const result = applyRules(content, createGradleRules(table));
  if (!result.changed || result.content.includes(GRADLE_COMMENT_MARKER)) return result;
  return { ...result, content: `${GRADLE_COMMENT}${result.content}` };
}
