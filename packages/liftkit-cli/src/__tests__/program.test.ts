import { describe, it, expect } from 'vitest';
import { createProgram } from '../program.js';

describe('createProgram', () => {
  it('registers every command', () => {
    const program = createProgram('1.2.3');

    expect(program.name()).toBe('liftkit');
    expect(program.version()).toBe('1.2.3');
    expect(program.commands.map((c) => c.name())).toEqual(['scan', 'diff', 'analyze', 'batch']);
  });

  it('declares the command arguments', () => {
    const program = createProgram('1.2.3');
    const usage = Object.fromEntries(program.commands.map((c) => [c.name(), c.usage()]));

    expect(usage).toEqual({
      scan: '[options] <project>',
      diff: '[options] <original> <modernized>',
      analyze: '[options] <project>',
      batch: '[options] <projects...>',
    });
  });
});
