/**
 * Root logger for the CLI. Log lines go to stderr so that patches and
 * reports printed on stdout stay clean.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { CliConfig } from './types.js';

export function createLogger(config: Pick<CliConfig, 'logLevel' | 'logPretty'>): Logger {
  if (config.logPretty) {
    return pino({
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }
  return pino({ level: config.logLevel }, pino.destination(2));
}
