/**
 * Maven pom.xml rules.
 */

import { applyRules } from './apply-rules.js';
import type { DependencyTable, RewriteResult, RewriteRule } from './types.js';

export const MAVEN_COMMENT_MARKER = 'MODERNIZED by liftkit';

const MAVEN_COMMENT = `<!-- ${MAVEN_COMMENT_MARKER} - Updated to Java 21 and Spring Boot 3.x -->`;

/** Escape text for use inside a RegExp */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Replace the text of a simple property element */
function propertyRule(id: string, name: string, value: string): RewriteRule {
  const escaped = escapeRegExp(name);
  return {
    id,
    description: `Updated ${name} to ${value}`,
    pattern: new RegExp(`<${escaped}>.*?</${escaped}>`, 'g'),
    replacement: `<${name}>${value}</${name}>`,
  };
}

/** Insert a property before </properties> when the pom has none */
function addPropertyRule(id: string, name: string, value: string): RewriteRule {
  const present = new RegExp(`<${escapeRegExp(name)}>`);
  return {
    id,
    description: `Added ${name} property (${value})`,
    pattern: /([ \t]*)<\/properties>/,
    replacement: (_match, indent: string) =>
      `${indent}    <${name}>${value}</${name}>\n${indent}</properties>`,
    when: (content) => !present.test(content),
  };
}

/** Set the <version> that directly follows an artifactId */
function artifactVersionRule(id: string, artifactId: string, version: string): RewriteRule {
  return {
    id,
    description: `Updated ${artifactId} to ${version}`,
    pattern: new RegExp(
      `(<artifactId>\\s*${escapeRegExp(artifactId)}\\s*</artifactId>\\s*<version>).*?(</version>)`,
      'g',
    ),
    replacement: (_match, head: string, tail: string) => `${head}${version}${tail}`,
  };
}

/**
 * Build the pom.xml table for a dependency table. Order matters: the parent
 * and Java level come first, plugins last.
 */
export function createMavenRules(table: DependencyTable): RewriteRule[] {
  const { targets } = table;
  return [
    {
      id: 'maven.parent-version',
      description: `Updated parent spring-boot-starter-parent version to ${targets.springBoot}`,
      pattern:
        /(<parent>[\s\S]*?<artifactId>spring-boot-starter-parent<\/artifactId>[\s\S]*?<version>)[0-9.]+(?:\.RELEASE)?<\/version>/g,
      replacement: (_match, head: string) => `${head}${targets.springBoot}</version>`,
    },
    propertyRule('maven.java-version', 'java.version', targets.java),
    propertyRule('maven.compiler-source', 'maven.compiler.source', targets.java),
    addPropertyRule('maven.compiler-source-add', 'maven.compiler.source', targets.java),
    propertyRule('maven.compiler-target', 'maven.compiler.target', targets.java),
    addPropertyRule('maven.compiler-target-add', 'maven.compiler.target', targets.java),
    propertyRule('maven.spring-boot-version', 'spring-boot.version', targets.springBoot),
    ...Object.entries(table.maven).map(([artifactId, version]) =>
      artifactVersionRule(`maven.dependency.${artifactId}`, artifactId, version),
    ),
    propertyRule('maven.source-encoding', 'project.build.sourceEncoding', targets.sourceEncoding),
    artifactVersionRule(
      'maven.spring-boot-plugin',
      'spring-boot-maven-plugin',
      targets.springBootMavenPlugin,
    ),
    {
      id: 'maven.compiler-plugin',
      description: `Added maven-compiler-plugin version ${targets.mavenCompilerPlugin}`,
      pattern: /([ \t]*)(<artifactId>maven-compiler-plugin<\/artifactId>)(?!\s*<version>)/g,
      replacement: (_match, indent: string, tag: string) =>
        `${indent}${tag}\n${indent}<version>${targets.mavenCompilerPlugin}</version>`,
    },
    artifactVersionRule('maven.surefire-plugin', 'maven-surefire-plugin', targets.mavenSurefirePlugin),
  ];
}

/**
 * Apply the pom.xml table. A changed pom gets a comment after its XML
 * declaration, once.
 */
export function modernizePom(content: string, table: DependencyTable): RewriteResult {
  const result = applyRules(content, createMavenRules(table));
  if (!result.changed || result.content.includes(MAVEN_COMMENT_MARKER)) return result;
  return { ...result, content: result.content.replace('?>\n', `?>\n${MAVEN_COMMENT}\n`) };
}
