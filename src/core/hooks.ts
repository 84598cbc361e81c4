/**
 * core/hooks.ts
 *
 * Runs profile hook scripts (block / postswitch) as child processes.
 * Scripts run to completion with the caller's stdout/stderr; there is
 * no timeout, a hanging hook hangs the run.
 *
 * The engine only sees the HookRunner interface, so tests inject a fake
 * instead of spawning anything.
 */

import { spawnSync } from 'child_process';
import { HookRunner } from './types';
import { scopedLogger } from './logger';

/** Status reported when a hook could not be started or died on a signal. */
export const HOOK_SPAWN_FAILURE = 127;

export class ProcessHookRunner implements HookRunner {
  private readonly log = scopedLogger('core/hooks');

  run(executable: string, args: string[], env: Record<string, string> = {}): number {
    this.log.debug({ executable, args }, 'Running hook');

    const result = spawnSync(executable, args, {
      stdio: 'inherit',
      env: { ...process.env, ...env }
    });

    if (result.error) {
      this.log.warn({ executable, error: result.error.message }, 'Hook could not be started');
      return HOOK_SPAWN_FAILURE;
    }
    if (result.status === null) {
      this.log.warn({ executable, signal: result.signal }, 'Hook terminated by signal');
      return HOOK_SPAWN_FAILURE;
    }

    this.log.debug({ executable, status: result.status }, 'Hook finished');
    return result.status;
  }
}
