/**
 * engine/block_gate.ts
 *
 * A profile's `block` script vetoes automatic selection.
 * Exit status 0 means BLOCKED; any other status (including a script that
 * fails to start) means not blocked. Existing block scripts depend on
 * this convention.
 */

import { scopedLogger } from '../core/logger';
import { ProfileStore } from './profile_store';

export class BlockGate {
  private readonly log = scopedLogger('engine/block_gate');

  constructor(private readonly store: ProfileStore) {}

  isBlocked(name: string): boolean {
    if (!this.store.hasBlockHook(name)) return false;

    const status = this.store.runBlockHook(name);
    this.log.debug({ profile: name, status }, 'Block hook finished');
    return status === 0;
  }
}
