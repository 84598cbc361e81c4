/**
 * engine/apply.ts
 *
 * Applies a stored profile:
 *   1. Read its layout; nothing stored means nothing to do.
 *   2. Unless forced, compare with the live layout and stop if equal.
 *   3. Send every directive to the display in one batch. Failures are
 *      reported, never retried or rolled back.
 *   4. Run the profile postswitch hook, then the global one. Hook
 *      failures are logged only; the layout stays applied.
 */

import { ApplyOutcome, DisplayControl } from '../core/types';
import { DisplayCommandError, HookError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ProfileStore } from './profile_store';
import { LayoutSnapshotter } from './snapshot';
import { layoutsEqual } from './layout_format';

export interface ApplyOptions {
  force?: boolean;
  dryRun?: boolean;
}

export class ApplyEngine {
  private readonly log = scopedLogger('engine/apply');

  constructor(
    private readonly store: ProfileStore,
    private readonly display: DisplayControl,
    private readonly snapshotter: LayoutSnapshotter
  ) {}

  apply(name: string, options: ApplyOptions = {}): ApplyOutcome {
    const layout = this.store.readLayout(name);
    if (layout.length === 0) {
      this.log.warn({ profile: name }, 'Profile has no layout record, nothing to apply');
      return { status: 'skipped-empty' };
    }

    const command = this.display.describe(layout);

    try {
      if (!options.force && layoutsEqual(this.snapshotter.snapshot(), layout)) {
        this.log.info({ profile: name }, 'Layout already active');
        return { status: 'skipped-idempotent' };
      }

      if (options.dryRun) {
        return { status: 'applied', command, dryRun: true };
      }

      this.display.apply(layout);
    } catch (e) {
      const error = e instanceof Error ? e : new DisplayCommandError(command, String(e));
      this.log.error({ profile: name, error: error.message }, 'Display command failed');
      return { status: 'failed', error };
    }

    this.log.info({ profile: name }, 'Layout applied');
    this.runPostswitchHooks(name);
    return { status: 'applied', command, dryRun: false };
  }

  private runPostswitchHooks(name: string): void {
    if (this.store.hasProfileHook(name)) {
      this.reportHook(name, 'profile', this.store.runProfileHook(name));
    }
    if (this.store.hasGlobalHook()) {
      this.reportHook(name, 'global', this.store.runGlobalHook(name));
    }
  }

  private reportHook(name: string, scope: 'profile' | 'global', status: number): void {
    if (status === 0) return;
    const error = new HookError(`${scope} postswitch`, status);
    this.log.warn({ profile: name, code: error.code, status }, error.message);
  }
}
