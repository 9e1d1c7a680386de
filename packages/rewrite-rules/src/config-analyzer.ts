/**
 * Configuration analyzer.
 *
 * Reads build, configuration and source files without changing them and
 * reports what still stands between the project and Java 21 / Spring Boot 3.
 */

import { posix } from 'node:path';
import yaml from 'js-yaml';
import { DEPRECATED_PROPERTIES, PROPERTY_RENAMES } from './properties-rules.js';
import type { ConfigAnalysis, ConfigFileType, ConfigIssue, ConfigRecommendation } from './types.js';

const LEGACY_JAVA_VERSIONS = new Set(['1.8', '8', '11']);
const TARGET_JAVA = '21';
const TARGET_SPRING_BOOT = '3.x';

function isLegacyJava(value: string): boolean {
  return LEGACY_JAVA_VERSIONS.has(value.trim());
}

/** Table value for a key the table itself defines */
function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function propertyFindings(
  key: string,
  value: string,
  line: number | undefined,
  issues: ConfigIssue[],
  recommendations: ConfigRecommendation[],
): void {
  const deprecation = lookup(DEPRECATED_PROPERTIES, key);
  if (deprecation !== undefined) {
    issues.push({
      severity: 'warning',
      line,
      property: key,
      message: `Property '${key}' is deprecated in Spring Boot 3.x`,
      suggestion: deprecation,
    });
  }

  const renamed = lookup(PROPERTY_RENAMES, key);
  if (renamed !== undefined) {
    recommendations.push({
      property: key,
      newProperty: renamed,
      currentValue: value,
      message: `Migrate property from '${key}' to '${renamed}'`,
    });
  }

  if (key.includes('java.version') && (value === '' || isLegacyJava(value))) {
    recommendations.push({
      property: key,
      currentValue: value,
      suggestedValue: TARGET_JAVA,
      message: `Update Java version to ${TARGET_JAVA}`,
    });
  }
}

/**
 * Analyze application.properties content.
 */
export function analyzeProperties(content: string): ConfigAnalysis {
  const issues: ConfigIssue[] = [];
  const recommendations: ConfigRecommendation[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) return;
    const separator = line.search(/[=:]/);
    if (separator === -1) return;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    propertyFindings(key, value, index + 1, issues, recommendations);
  });

  return { fileType: 'properties', issues, recommendations };
}

/** Flatten nested mappings into dotted keys; sequences and scalars are leaves */
export function flattenYaml(value: unknown, prefix = '', out: Map<string, string> = new Map()): Map<string, string> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, child] of Object.entries(value)) {
      flattenYaml(child, prefix ? `${prefix}.${key}` : key, out);
    }
  } else if (prefix) {
    out.set(prefix, value === null || value === undefined ? '' : String(value));
  }
  return out;
}

/**
 * Analyze application.yml / application.yaml content.
 */
export function analyzeYaml(content: string): ConfigAnalysis {
  const issues: ConfigIssue[] = [];
  const recommendations: ConfigRecommendation[] = [];

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    issues.push({
      severity: 'error',
      message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}`,
    });
    return { fileType: 'yaml', issues, recommendations };
  }

  for (const [key, value] of flattenYaml(parsed)) {
    propertyFindings(key, value, undefined, issues, recommendations);
  }

  return { fileType: 'yaml', issues, recommendations };
}

/**
 * Analyze the <properties> block of a pom.xml.
 */
export function analyzePomProperties(content: string): ConfigAnalysis {
  const issues: ConfigIssue[] = [];
  const recommendations: ConfigRecommendation[] = [];

  const block = /<properties>([\s\S]*?)<\/properties>/.exec(content);
  if (!block) return { fileType: 'pom.xml', issues, recommendations };

  for (const match of (block[1] ?? '').matchAll(/<([\w.-]+)>([^<]+)<\/\1>/g)) {
    const name = match[1] ?? '';
    const value = (match[2] ?? '').trim();
    const lower = name.toLowerCase();

    if (lower.includes('java') && lower.includes('version') && isLegacyJava(value)) {
      issues.push({
        severity: 'warning',
        property: name,
        message: `Java ${value} detected - upgrade to ${TARGET_JAVA} recommended`,
      });
      recommendations.push({
        property: name,
        currentValue: value,
        suggestedValue: TARGET_JAVA,
        message: `Update Java version from ${value} to ${TARGET_JAVA}`,
      });
    }

    if (/spring[.-]boot/.test(lower) && value.startsWith('2.')) {
      issues.push({
        severity: 'warning',
        property: name,
        message: `Spring Boot 2.x detected (${value}) - upgrade to ${TARGET_SPRING_BOOT} required`,
      });
      recommendations.push({
        property: name,
        currentValue: value,
        suggestedValue: TARGET_SPRING_BOOT,
        message: `Update Spring Boot from ${value} to ${TARGET_SPRING_BOOT}`,
      });
    }
  }

  return { fileType: 'pom.xml', issues, recommendations };
}

/**
 * Analyze a build.gradle file.
 */
export function analyzeGradle(content: string): ConfigAnalysis {
  const issues: ConfigIssue[] = [];
  const recommendations: ConfigRecommendation[] = [];

  for (const setting of ['sourceCompatibility', 'targetCompatibility']) {
    const quoted = new RegExp(`${setting}\\s*=\\s*['"]?([\\d.]+)['"]?`).exec(content);
    const enumForm = new RegExp(`${setting}\\s*=\\s*JavaVersion\\.VERSION_([\\d_]+)`).exec(content);
    const value = quoted?.[1] ?? enumForm?.[1]?.replace('_', '.');
    if (value !== undefined && isLegacyJava(value)) {
      recommendations.push({
        property: setting,
        currentValue: value,
        suggestedValue: TARGET_JAVA,
        message: `Update ${setting} from ${value} to ${TARGET_JAVA}`,
      });
    }
  }

  const plugin = /id\s+['"]org\.springframework\.boot['"]\s+version\s+['"]([^'"]+)['"]/.exec(content);
  const buildscript = /['"]org\.springframework\.boot:spring-boot-gradle-plugin:([^'"]+)['"]/.exec(content);
  const bootVersion = plugin?.[1] ?? buildscript?.[1];
  if (bootVersion !== undefined && bootVersion.startsWith('2.')) {
    issues.push({
      severity: 'warning',
      property: 'org.springframework.boot',
      message: `Spring Boot 2.x detected (${bootVersion}) - upgrade to ${TARGET_SPRING_BOOT} required`,
    });
    recommendations.push({
      property: 'org.springframework.boot',
      currentValue: bootVersion,
      suggestedValue: TARGET_SPRING_BOOT,
      message: `Update Spring Boot Gradle plugin from ${bootVersion} to ${TARGET_SPRING_BOOT}`,
    });
  }

  return { fileType: 'build.gradle', issues, recommendations };
}

/** Source patterns worth a look, with the advice shown for each */
const JAVA_SOURCE_CHECKS: ReadonlyArray<{ pattern: RegExp; severity: ConfigIssue['severity']; message: string }> = [
  {
    pattern: /import\s+javax\./,
    severity: 'warning',
    message: 'javax.* imports found - must be replaced with jakarta.* for Spring Boot 3.x',
  },
  {
    pattern: /@Deprecated\b/,
    severity: 'info',
    message: 'Deprecated annotations found - review and upgrade to current APIs',
  },
  {
    pattern: /org\.springframework\.context\.support\.ClassPathXmlApplicationContext/,
    severity: 'warning',
    message: 'XML-based Spring configuration detected - migrate to @Configuration classes',
  },
  {
    pattern: /new\s+\w+\s*<>?\s*\(\)\s*\{\s*public\s+\w+/,
    severity: 'info',
    message: 'Anonymous inner classes found - consider lambda expressions',
  },
  {
    pattern: /if\s*\(\s*\w+\s*!=\s*null\s*\)/,
    severity: 'info',
    message: 'Manual null checks found - consider Optional',
  },
  {
    pattern: /try\s*\{[\s\S]*?finally\s*\{[\s\S]*?close/,
    severity: 'info',
    message: 'Manual resource management found - use try-with-resources',
  },
  {
    pattern: /Runtime\.getRuntime\(\)\.exec\(/,
    severity: 'warning',
    message: 'Runtime.exec() found - use ProcessBuilder or the ProcessHandle API',
  },
  {
    pattern: /new\s+URL\(/,
    severity: 'warning',
    message: 'new URL() found - use URI or HttpClient',
  },
  {
    pattern: /HttpURLConnection/,
    severity: 'warning',
    message: 'HttpURLConnection found - use HttpClient',
  },
  {
    pattern: /sun\.misc\.BASE64/,
    severity: 'warning',
    message: 'sun.misc.BASE64 found - use java.util.Base64',
  },
];

/**
 * Analyze a Java source file.
 */
export function analyzeJavaSource(content: string): ConfigAnalysis {
  const issues: ConfigIssue[] = JAVA_SOURCE_CHECKS.filter((check) => check.pattern.test(content)).map(
    (check) => ({ severity: check.severity, message: check.message }),
  );
  const recommendations: ConfigRecommendation[] = [];

  const javaxImports = content.match(/import\s+javax\./g)?.length ?? 0;
  if (javaxImports > 0) {
    recommendations.push({
      property: 'imports',
      currentValue: 'javax.*',
      suggestedValue: 'jakarta.*',
      message: `Migrate ${javaxImports} javax.* import${javaxImports === 1 ? '' : 's'} to jakarta.*`,
    });
  }

  return { fileType: 'java', issues, recommendations };
}

/**
 * Which analyzer handles a file, by name. Null when none does.
 */
export function configFileType(fileName: string): ConfigFileType | null {
  const name = posix.basename(fileName.split('\\').join('/'));
  if (/^application(-[\w-]+)?\.properties$/.test(name)) return 'properties';
  if (/^application(-[\w-]+)?\.ya?ml$/.test(name)) return 'yaml';
  if (name === 'pom.xml') return 'pom.xml';
  if (name === 'build.gradle') return 'build.gradle';
  if (name.endsWith('.java')) return 'java';
  return null;
}

/**
 * Analyze a file by name. Returns null for files no analyzer handles.
 */
export function analyzeConfigFile(fileName: string, content: string): ConfigAnalysis | null {
  switch (configFileType(fileName)) {
    case 'properties':
      return analyzeProperties(content);
    case 'yaml':
      return analyzeYaml(content);
    case 'pom.xml':
      return analyzePomProperties(content);
    case 'build.gradle':
      return analyzeGradle(content);
    case 'java':
      return analyzeJavaSource(content);
    case null:
      return null;
  }
}
