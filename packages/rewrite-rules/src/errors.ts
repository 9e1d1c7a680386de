/**
 * Raised when the bundled dependency table does not match its schema.
 */
export class RuleTableError extends Error {
  public readonly code = 'RULE_TABLE_INVALID';
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'RuleTableError';
    this.issues = issues;
  }
}
