import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { applyRules } from '../apply-rules.js';
import { RuleApplier } from '../rule-applier.js';
import type { RewriteRule } from '../types.js';

const rules: RewriteRule[] = [
  { id: 'a-to-b', description: 'a to b', pattern: /a/g, replacement: 'b' },
  { id: 'b-to-c', description: 'b to c', pattern: /b/g, replacement: (match) => match.toUpperCase() },
];

describe('applyRules', () => {
  it('feeds each rule the output of the previous one', () => {
    expect(applyRules('a-a', rules)).toEqual({
      content: 'B-B',
      changes: ['a to b', 'b to c'],
      changed: true,
    });
  });

  it('records nothing when no rule matches', () => {
    expect(applyRules('xyz', rules)).toEqual({ content: 'xyz', changes: [], changed: false });
  });

  it('skips rules whose guard rejects the content', () => {
    const guarded: RewriteRule[] = [
      { id: 'guarded', description: 'guarded', pattern: /x/g, replacement: 'y', when: (c) => c.startsWith('!') },
    ];
    expect(applyRules('x', guarded).changed).toBe(false);
    expect(applyRules('!x', guarded).content).toBe('!y');
  });

  it('ignores matches already in the target form', () => {
    const noop: RewriteRule[] = [
      { id: 'noop', description: 'set version', pattern: /<v>.*?<\/v>/g, replacement: '<v>21</v>' },
    ];
    expect(applyRules('<v>21</v>', noop)).toEqual({ content: '<v>21</v>', changes: [], changed: false });
  });

  it('can reuse a global pattern across calls', () => {
    expect(applyRules('a', rules).content).toBe('B');
    expect(applyRules('a', rules).content).toBe('B');
  });
});

describe('RuleApplier', () => {
  const applier = new RuleApplier(pino({ level: 'silent' }), {
    clock: () => new Date(2024, 0, 2, 3, 4, 5),
  });

  it('applies arbitrary tables', () => {
    expect(applier.applyRules('a', rules).content).toBe('B');
  });

  it('dispatches on the file name', () => {
    const result = applier.modernize('src/main/java/App.java', 'import javax.inject.Inject;\n');
    expect(result.kind).toBe('java');
    expect(result.changed).toBe(true);
    expect(result.content).toContain(' * Generated: 2024-01-02 03:04:05\n');
  });
});
