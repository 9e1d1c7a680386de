import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildCliConfig, validateCliConfig } from '../config.js';
import { DEFAULT_IGNORED_DIRS } from '../types.js';

describe('CLI Config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['LIFTKIT_LOG_LEVEL'];
    delete process.env['LIFTKIT_LOG_PRETTY'];
    delete process.env['LIFTKIT_CONTEXT_LINES'];
    delete process.env['LIFTKIT_TOP_FILES'];
    delete process.env['LIFTKIT_IGNORED_DIRS'];
    delete process.env['LIFTKIT_OUTPUT_SUFFIX'];
    delete process.env['LIFTKIT_MAX_CONCURRENT'];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('buildCliConfig', () => {
    it('should return defaults when no overrides or env vars', () => {
      const config = buildCliConfig();

      expect(config.logLevel).toBe('info');
      expect(config.logPretty).toBe(false);
      expect(config.contextLines).toBe(3);
      expect(config.topFiles).toBe(5);
      expect(config.outputSuffix).toBe('_modernized');
      expect(config.maxConcurrentFiles).toBe(8);
      expect(config.legacyNamespace).toBe('javax.');
      expect(config.targetNamespace).toBe('jakarta.');
      expect(config.ignoredDirs).toEqual([...DEFAULT_IGNORED_DIRS]);
    });

    it('should read values from env', () => {
      process.env['LIFTKIT_LOG_LEVEL'] = 'DEBUG';
      process.env['LIFTKIT_LOG_PRETTY'] = 'true';
      process.env['LIFTKIT_CONTEXT_LINES'] = '5';
      process.env['LIFTKIT_TOP_FILES'] = '10';
      process.env['LIFTKIT_OUTPUT_SUFFIX'] = '_next';
      process.env['LIFTKIT_MAX_CONCURRENT'] = '2';

      const config = buildCliConfig();

      expect(config.logLevel).toBe('debug');
      expect(config.logPretty).toBe(true);
      expect(config.contextLines).toBe(5);
      expect(config.topFiles).toBe(10);
      expect(config.outputSuffix).toBe('_next');
      expect(config.maxConcurrentFiles).toBe(2);
    });

    it('should fall back on unparseable env values', () => {
      process.env['LIFTKIT_CONTEXT_LINES'] = 'many';
      process.env['LIFTKIT_LOG_LEVEL'] = 'loud';

      const config = buildCliConfig();

      expect(config.contextLines).toBe(3);
      expect(config.logLevel).toBe('info');
    });

    it('should prefer override over environment variable', () => {
      process.env['LIFTKIT_TOP_FILES'] = '10';
      const config = buildCliConfig({ topFiles: 2 });

      expect(config.topFiles).toBe(2);
    });

    it('should merge and deduplicate ignored directories', () => {
      process.env['LIFTKIT_IGNORED_DIRS'] = 'generated, target ,';
      const config = buildCliConfig({ ignoredDirs: ['vendor', 'generated'] });

      expect(config.ignoredDirs).toEqual([...DEFAULT_IGNORED_DIRS, 'generated', 'vendor']);
    });
  });

  describe('validateCliConfig', () => {
    it('should accept the defaults', () => {
      expect(validateCliConfig(buildCliConfig())).toEqual([]);
    });

    it('should report every invalid value', () => {
      const errors = validateCliConfig(
        buildCliConfig({
          contextLines: -1,
          topFiles: 0,
          maxConcurrentFiles: 100,
          outputSuffix: 'out/put',
        })
      );

      expect(errors).toEqual([
        'contextLines must not be negative',
        'topFiles must be at least 1',
        'maxConcurrentFiles must not exceed 64',
        'outputSuffix must not contain path separators',
      ]);
    });

    it('should require an output suffix', () => {
      expect(validateCliConfig(buildCliConfig({ outputSuffix: '' }))).toEqual([
        'outputSuffix is required: an empty suffix would write into the project itself',
      ]);
    });
  });
});
