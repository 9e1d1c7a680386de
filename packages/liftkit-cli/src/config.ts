/**
 * CLI configuration builder.
 *
 * Reads from environment variables with defaults.
 * All values can be overridden programmatically.
 */

import type { CliConfig, LogLevel } from './types.js';
import { DEFAULT_CLI_CONFIG, DEFAULT_IGNORED_DIRS, LOG_LEVELS } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvLogLevel(key: string, fallback: LogLevel): LogLevel {
  const raw = process.env[key]?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? fallback;
}

/**
 * Build CLI config from environment variables and optional overrides.
 *
 * Environment variables:
 * - LIFTKIT_LOG_LEVEL: pino level (default: info)
 * - LIFTKIT_LOG_PRETTY: Pretty log output (default: false)
 * - LIFTKIT_CONTEXT_LINES: Context lines per patch hunk (default: 3)
 * - LIFTKIT_TOP_FILES: Size of the most-modified ranking (default: 5)
 * - LIFTKIT_IGNORED_DIRS: Comma-separated additional ignored directory names
 * - LIFTKIT_OUTPUT_SUFFIX: Output directory suffix (default: _modernized)
 * - LIFTKIT_MAX_CONCURRENT: Files processed at once (default: 8)
 */
export function buildCliConfig(overrides?: Partial<CliConfig>): CliConfig {
  // Merge additional ignored directories from env
  const envIgnored = process.env['LIFTKIT_IGNORED_DIRS'];
  const extraIgnored = envIgnored
    ? envIgnored.split(',').map((d) => d.trim()).filter((d) => d.length > 0)
    : [];
  const mergedIgnored = [
    ...DEFAULT_IGNORED_DIRS,
    ...extraIgnored,
    ...(overrides?.ignoredDirs ?? []),
  ];

  // Deduplicate
  const uniqueIgnored = [...new Set(mergedIgnored)];

  return {
    logLevel: overrides?.logLevel ?? getEnvLogLevel('LIFTKIT_LOG_LEVEL', DEFAULT_CLI_CONFIG.logLevel),
    logPretty: overrides?.logPretty ?? getEnv('LIFTKIT_LOG_PRETTY', 'false') === 'true',
    contextLines: overrides?.contextLines ?? getEnvNumber('LIFTKIT_CONTEXT_LINES', DEFAULT_CLI_CONFIG.contextLines),
    topFiles: overrides?.topFiles ?? getEnvNumber('LIFTKIT_TOP_FILES', DEFAULT_CLI_CONFIG.topFiles),
    ignoredDirs: uniqueIgnored,
    outputSuffix: overrides?.outputSuffix ?? getEnv('LIFTKIT_OUTPUT_SUFFIX', DEFAULT_CLI_CONFIG.outputSuffix),
    maxConcurrentFiles: overrides?.maxConcurrentFiles ?? getEnvNumber('LIFTKIT_MAX_CONCURRENT', DEFAULT_CLI_CONFIG.maxConcurrentFiles),
    legacyNamespace: overrides?.legacyNamespace ?? DEFAULT_CLI_CONFIG.legacyNamespace,
    targetNamespace: overrides?.targetNamespace ?? DEFAULT_CLI_CONFIG.targetNamespace,
  };
}

/**
 * Validate a CLI configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateCliConfig(config: CliConfig): string[] {
  const errors: string[] = [];

  if (config.contextLines < 0) {
    errors.push('contextLines must not be negative');
  }

  if (config.contextLines > 1000) {
    errors.push('contextLines must not exceed 1000');
  }

  if (config.topFiles < 1) {
    errors.push('topFiles must be at least 1');
  }

  if (config.maxConcurrentFiles < 1) {
    errors.push('maxConcurrentFiles must be at least 1');
  }

  if (config.maxConcurrentFiles > 64) {
    errors.push('maxConcurrentFiles must not exceed 64');
  }

  if (!config.outputSuffix) {
    errors.push('outputSuffix is required: an empty suffix would write into the project itself');
  } else if (/[\\/]/.test(config.outputSuffix)) {
    errors.push('outputSuffix must not contain path separators');
  }

  if (!config.legacyNamespace) {
    errors.push('legacyNamespace is required');
  }

  if (!config.targetNamespace) {
    errors.push('targetNamespace is required');
  }

  return errors;
}
