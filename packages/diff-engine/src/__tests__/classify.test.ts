import { describe, it, expect } from 'vitest';
import {
  categorizeChange,
  createClassificationRules,
  DEFAULT_CLASSIFICATION_RULES,
} from '../classify.js';
import { extractChangedSections } from '../sections.js';
import { splitLines } from '../sequence.js';

describe('categorizeChange', () => {
  it('detects namespace migrations', () => {
    expect(categorizeChange('import javax.inject.Inject;', 'import jakarta.inject.Inject;')).toBe(
      'namespace_migration',
    );
  });

  it('detects added and removed imports', () => {
    expect(categorizeChange('', 'import java.util.List;')).toBe('import_added');
    expect(categorizeChange('import java.util.List;', '')).toBe('import_removed');
  });

  it('detects added comments', () => {
    expect(categorizeChange('int a;', '// int a;')).toBe('comment_added');
  });

  it('detects removed deprecations', () => {
    expect(categorizeChange('@Deprecated\nvoid f() {}', 'void f() {}')).toBe('deprecated_removed');
  });

  it('falls back to code_updated', () => {
    expect(categorizeChange('int a = 1;', 'int a = 2;')).toBe('code_updated');
  });

  it('applies rules in table order', () => {
    // Both the namespace and the comment rule match; namespace comes first
    expect(categorizeChange('javax.a', '// jakarta.a')).toBe('namespace_migration');
  });

  it('matches substrings, not tokens', () => {
    expect(categorizeChange('', 'String important = "";')).toBe('import_added');
  });

  it('exposes the default table in order', () => {
    expect(DEFAULT_CLASSIFICATION_RULES.map((rule) => rule.category)).toEqual([
      'namespace_migration',
      'import_added',
      'import_removed',
      'comment_added',
      'deprecated_removed',
    ]);
  });

  it('builds a table for other namespaces', () => {
    const rules = createClassificationRules({
      legacyNamespace: 'org.old.',
      targetNamespace: 'org.new.',
    });
    expect(categorizeChange('org.old.A', 'org.new.A', rules)).toBe('namespace_migration');
    expect(categorizeChange('javax.A', 'jakarta.A', rules)).toBe('code_updated');
  });
});

describe('extractChangedSections', () => {
  it('emits one section per non-equal region', () => {
    const sections = extractChangedSections(
      splitLines('import javax.a.B;\nclass C {\n  @Deprecated\n  void f() {}\n}\n'),
      splitLines('import jakarta.a.B;\nclass C {\n  void f() {}\n}\n'),
    );

    expect(sections).toEqual([
      {
        type: 'replace',
        original_start: 1,
        original_end: 1,
        modernized_start: 1,
        modernized_end: 1,
        original_code: 'import javax.a.B;',
        modernized_code: 'import jakarta.a.B;',
        change_type: 'namespace_migration',
      },
      {
        type: 'delete',
        original_start: 3,
        original_end: 3,
        modernized_start: 3,
        modernized_end: 2,
        original_code: '@Deprecated',
        modernized_code: '',
        change_type: 'deprecated_removed',
      },
    ]);
  });

  it('returns nothing for equal input', () => {
    expect(extractChangedSections(['a\n'], ['a\n'])).toEqual([]);
  });
});
