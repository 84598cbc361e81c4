/**
 * core/logger.ts
 *
 * Singleton pino logger writing to stderr, so stdout stays free for
 * the profile names and fingerprints the CLI prints.
 *
 * Child loggers are scoped with a `module` field:
 *     const log = scopedLogger('engine/matcher');
 * Components create theirs in the constructor, after initLogger has run.
 */

import pino from 'pino';
import { AutolayoutConfig } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: Pick<AutolayoutConfig, 'logLevel'>): pino.Logger {
  instance = pino({ level: config.logLevel }, pino.destination(2));
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for use before initLogger is called (tests, early errors)
    instance = pino({ level: 'warn' }, pino.destination(2));
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('engine/apply');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
