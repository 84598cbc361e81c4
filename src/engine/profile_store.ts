/**
 * engine/profile_store.ts
 *
 * Filesystem-backed profile store. One directory per profile:
 *
 *   <root>/<name>/setup        fingerprint, one line
 *   <root>/<name>/config       layout, see layout_format.ts
 *   <root>/<name>/block        optional executable predicate
 *   <root>/<name>/postswitch   optional executable hook
 *   <root>/postswitch          optional global hook
 *
 * Hook scripts are executed through the injected HookRunner with the
 * profile name as their only argument.
 */

import * as fs from 'fs';
import * as path from 'path';
import { HookRunner, Layout } from '../core/types';
import { InvalidProfileNameError, ProfileNotFoundError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { formatLayout, parseLayout } from './layout_format';

export const SETUP_FILE = 'setup';
export const CONFIG_FILE = 'config';
export const BLOCK_HOOK = 'block';
export const POSTSWITCH_HOOK = 'postswitch';

export function isValidProfileName(name: string): boolean {
  return name.length > 0 && !name.startsWith('.') && !name.includes('/') && !name.includes('\0');
}

function isExecutable(file: string): boolean {
  try {
    if (!fs.statSync(file).isFile()) return false;
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function writeAtomic(file: string, contents: string): void {
  const tmp = `${file}.tmp-${process.pid}`;
  fs.writeFileSync(tmp, contents, 'utf-8');
  fs.renameSync(tmp, file);
}

export class ProfileStore {
  private readonly log = scopedLogger('engine/profile_store');

  constructor(
    readonly root: string,
    private readonly hooks: HookRunner
  ) {}

  private dir(name: string): string {
    if (!isValidProfileName(name)) throw new InvalidProfileNameError(name);
    return path.join(this.root, name);
  }

  /** Record contents, or null when missing or unreadable as a file. */
  private readRecord(name: string, record: string): string | null {
    const file = path.join(this.dir(name), record);
    if (!fs.existsSync(file)) return null;
    try {
      if (!fs.statSync(file).isFile()) {
        this.log.debug({ profile: name, record }, 'Record is not a regular file, ignored');
        return null;
      }
      return fs.readFileSync(file, 'utf-8');
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      this.log.debug({ profile: name, record, error }, 'Record unreadable, ignored');
      return null;
    }
  }

  private hookEnv(name: string): Record<string, string> {
    return { AUTOLAYOUT_PROFILE: name };
  }

  // -----------------------------------------------------------------------
  // Profiles
  // -----------------------------------------------------------------------

  /** Profile directory names, sorted; hidden entries and files skipped. */
  listProfiles(): string[] {
    if (!fs.existsSync(this.root)) return [];
    return fs
      .readdirSync(this.root, { withFileTypes: true })
      .filter(entry => entry.isDirectory() && isValidProfileName(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  exists(name: string): boolean {
    const dir = this.dir(name);
    return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
  }

  /** The stored fingerprint, or "" when there is no setup record. */
  readFingerprint(name: string): string {
    return (this.readRecord(name, SETUP_FILE) ?? '').trim();
  }

  /** The stored layout, or [] when there is no config record. */
  readLayout(name: string): Layout {
    const text = this.readRecord(name, CONFIG_FILE);
    return text === null ? [] : parseLayout(text);
  }

  /** Writes setup first, then config; each via rename. */
  writeProfile(name: string, fingerprint: string, layout: Layout): void {
    const dir = this.dir(name);
    fs.mkdirSync(dir, { recursive: true });
    writeAtomic(path.join(dir, SETUP_FILE), `${fingerprint}\n`);
    writeAtomic(path.join(dir, CONFIG_FILE), formatLayout(layout));
    this.log.info({ profile: name, outputs: layout.length }, 'Profile saved');
  }

  removeProfile(name: string): void {
    if (!this.exists(name)) throw new ProfileNotFoundError(name);
    fs.rmSync(this.dir(name), { recursive: true, force: true });
    this.log.info({ profile: name }, 'Profile removed');
  }

  // -----------------------------------------------------------------------
  // Hooks
  // -----------------------------------------------------------------------

  private blockHookPath(name: string): string {
    return path.join(this.dir(name), BLOCK_HOOK);
  }

  private profileHookPath(name: string): string {
    return path.join(this.dir(name), POSTSWITCH_HOOK);
  }

  private globalHookPath(): string {
    return path.join(this.root, POSTSWITCH_HOOK);
  }

  hasBlockHook(name: string): boolean {
    return isExecutable(this.blockHookPath(name));
  }

  runBlockHook(name: string): number {
    return this.hooks.run(this.blockHookPath(name), [name], this.hookEnv(name));
  }

  hasProfileHook(name: string): boolean {
    return isExecutable(this.profileHookPath(name));
  }

  runProfileHook(name: string): number {
    return this.hooks.run(this.profileHookPath(name), [name], this.hookEnv(name));
  }

  hasGlobalHook(): boolean {
    return isExecutable(this.globalHookPath());
  }

  /** The global hook still learns which profile was applied. */
  runGlobalHook(name: string): number {
    return this.hooks.run(this.globalHookPath(), [name], this.hookEnv(name));
  }
}
