/**
 * engine/matcher.ts
 *
 * Linear scan over stored profiles in store order. The first profile that
 * is not blocked and whose fingerprint equals the current one wins; later
 * profiles are not examined. With no match, a configured default profile
 * is returned as a fallback without running its block hook or comparing
 * its fingerprint.
 */

import { Selection, SelectionEvent } from '../core/types';
import { scopedLogger } from '../core/logger';
import { ProfileStore } from './profile_store';
import { BlockGate } from './block_gate';

export type SelectionListener = (event: SelectionEvent) => void;

export interface MatcherOptions {
  defaultProfile?: string;
  onEvent?: SelectionListener;
}

export class ProfileMatcher {
  private readonly log = scopedLogger('engine/matcher');

  constructor(
    private readonly store: ProfileStore,
    private readonly gate: BlockGate,
    private readonly options: MatcherOptions = {}
  ) {}

  private emit(event: SelectionEvent): void {
    this.options.onEvent?.(event);
  }

  /**
   * @param currentFingerprint null when the hardware could not be
   *   identified; nothing matches then.
   */
  select(currentFingerprint: string | null): Selection {
    for (const name of this.store.listProfiles()) {
      this.emit({ type: 'considered', name });

      if (this.gate.isBlocked(name)) {
        this.log.info({ profile: name }, 'Profile blocked');
        this.emit({ type: 'blocked', name });
        continue;
      }

      const stored = this.store.readFingerprint(name);
      if (!stored || currentFingerprint === null || stored !== currentFingerprint) continue;

      this.log.info({ profile: name }, 'Profile matched');
      this.emit({ type: 'detected', name });
      return { kind: 'matched', name };
    }

    if (this.options.defaultProfile) {
      this.log.info({ profile: this.options.defaultProfile }, 'No match, using default profile');
      return { kind: 'fallback', name: this.options.defaultProfile };
    }

    this.log.info('No profile matched');
    return { kind: 'none' };
  }
}
