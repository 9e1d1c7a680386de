/**
 * Shared setup for command actions: configuration and the root logger.
 */

import type { Command } from 'commander';
import type { Logger } from 'pino';
import { buildCliConfig, validateCliConfig } from '../config.js';
import { createLogger } from '../logger.js';
import type { CliConfig } from '../types.js';
import { LOG_LEVELS } from '../types.js';

/** Options registered on the root program */
export type GlobalOptions = {
  logLevel?: string;
  pretty?: boolean;
};

export interface CommandContext {
  config: CliConfig;
  logger: Logger;
}

/** Parse an integer option value */
export function parseIntOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Expected a number, got '${value}'`);
  }
  return parsed;
}

/**
 * Build the config from env, global flags and per-command overrides.
 *
 * @throws Error when the log level is unknown or the config is invalid
 */
export function createContext(command: Command, overrides: Partial<CliConfig> = {}): CommandContext {
  const globals = command.optsWithGlobals<GlobalOptions>();

  const logLevel = LOG_LEVELS.find((level) => level === globals.logLevel);
  if (globals.logLevel !== undefined && logLevel === undefined) {
    throw new Error(`Unknown log level '${globals.logLevel}'. Use one of: ${LOG_LEVELS.join(', ')}`);
  }

  const config = buildCliConfig({
    ...overrides,
    logLevel,
    logPretty: globals.pretty ? true : undefined,
  });

  const errors = validateCliConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  return { config, logger: createLogger(config) };
}
