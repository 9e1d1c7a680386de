/**
 * @liftkit/rewrite-rules
 *
 * Ordered regex rule tables that move Maven, Gradle, properties and Java
 * sources toward Java 21 and Spring Boot 3, plus a read-only analyzer for
 * configuration files.
 */

// Types
export type {
  Replacement,
  RewriteRule,
  RewriteResult,
  ModernizedFileKind,
  ModernizedFile,
  ModernizeOptions,
  TargetVersions,
  DependencyTable,
  ConfigFileType,
  IssueSeverity,
  ConfigIssue,
  ConfigRecommendation,
  ConfigAnalysis,
} from './types.js';

// Errors
export { RuleTableError } from './errors.js';

// Rule application
export { applyRules } from './apply-rules.js';
export { RuleApplier } from './rule-applier.js';
export { modernizeFile, detectFileKind } from './modernize.js';

// Rule tables
export {
  JAVA_RULES,
  JAVA_HEADER_MARKER,
  buildJavaHeader,
  formatTimestamp,
  modernizeJavaSource,
} from './java-rules.js';
export { createMavenRules, modernizePom, escapeRegExp, MAVEN_COMMENT_MARKER } from './maven-rules.js';
export { createGradleRules, modernizeGradle, GRADLE_COMMENT_MARKER } from './gradle-rules.js';
export {
  PROPERTIES_RULES,
  PROPERTY_RENAMES,
  DEPRECATED_PROPERTIES,
  modernizeProperties,
} from './properties-rules.js';
export { DependencyTableSchema, loadDependencyTable, parseDependencyTable } from './dependency-table.js';

// Analysis
export {
  analyzeProperties,
  analyzeYaml,
  analyzePomProperties,
  analyzeGradle,
  analyzeJavaSource,
  analyzeConfigFile,
  configFileType,
  flattenYaml,
} from './config-analyzer.js';
