/**
 * Types for the rewrite rule tables.
 */

/** Replacement text, or a function called once per match */
export type Replacement = string | ((match: string, ...groups: string[]) => string);

/** One regex rewrite, applied in table order */
export interface RewriteRule {
  /** Stable identifier */
  id: string;

  /** Human-readable change, recorded when the rule matches */
  description: string;

  pattern: RegExp;
  replacement: Replacement;

  /** Guard evaluated against the content before this rule runs */
  when?: (content: string) => boolean;
}

/** Outcome of applying a rule table */
export interface RewriteResult {
  content: string;

  /** Descriptions of the rules that matched, in order */
  changes: string[];

  /** Whether the content differs from the input */
  changed: boolean;
}

/** File kinds the rule tables know about */
export type ModernizedFileKind = 'java' | 'maven' | 'gradle' | 'properties' | 'other';

/** A file after its rule table has been applied */
export interface ModernizedFile extends RewriteResult {
  kind: ModernizedFileKind;
}

/** Options for modernizing a file */
export interface ModernizeOptions {
  /** Clock for the generated Java header (default: current time) */
  clock?: () => Date;
}

/** Target versions written by the rule tables */
export interface TargetVersions {
  java: string;
  springBoot: string;
  springBootMavenPlugin: string;
  mavenCompilerPlugin: string;
  mavenSurefirePlugin: string;
  sourceEncoding: string;
}

/** Bundled version tables */
export interface DependencyTable {
  targets: TargetVersions;

  /** Maven artifactId to version */
  maven: Record<string, string>;

  /** Gradle `group:name` to version */
  gradle: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Configuration analysis
// ---------------------------------------------------------------------------

export type ConfigFileType = 'properties' | 'yaml' | 'pom.xml' | 'build.gradle' | 'java';

export type IssueSeverity = 'info' | 'warning' | 'error';

/** Something in a file that needs attention */
export interface ConfigIssue {
  severity: IssueSeverity;
  message: string;

  /** 1-based line, when the finding is tied to one */
  line?: number;

  /** Property or key the finding is about */
  property?: string;

  suggestion?: string;
}

/** A suggested change of a key or value */
export interface ConfigRecommendation {
  property: string;
  message: string;
  currentValue?: string;
  suggestedValue?: string;

  /** Replacement key, for property migrations */
  newProperty?: string;
}

/** Findings for one file */
export interface ConfigAnalysis {
  fileType: ConfigFileType;
  issues: ConfigIssue[];
  recommendations: ConfigRecommendation[];
}
