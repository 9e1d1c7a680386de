/**
 * Rule applier that logs what each file went through.
 */

import type { Logger } from 'pino';
import { applyRules } from './apply-rules.js';
import { modernizeFile } from './modernize.js';
import type { ModernizedFile, ModernizeOptions, RewriteResult, RewriteRule } from './types.js';

/**
 * Applies rule tables with logging.
 */
export class RuleApplier {
  private readonly logger: Logger;
  private readonly options: ModernizeOptions;

  constructor(logger: Logger, options: ModernizeOptions = {}) {
    this.logger = logger.child({ component: 'rule-applier' });
    this.options = options;
  }

  /** Apply an arbitrary rule table */
  applyRules(content: string, rules: readonly RewriteRule[]): RewriteResult {
    const result = applyRules(content, rules);
    this.logger.debug({ rules: rules.length, changes: result.changes.length }, 'Rules applied');
    return result;
  }

  /** Pick the rule table for a file by name and apply it */
  modernize(relativePath: string, content: string): ModernizedFile {
    const result = modernizeFile(relativePath, content, this.options);
    if (result.changed) {
      this.logger.info(
        { file: relativePath, kind: result.kind, changes: result.changes.length },
        'File modernized'
      );
    } else {
      this.logger.debug({ file: relativePath, kind: result.kind }, 'No changes needed');
    }
    return result;
  }
}
