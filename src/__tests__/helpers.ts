/**
 * In-process stand-ins for the display server, hook scripts and the
 * profile store directory. Shared by the engine and CLI tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DisplayControl, HookRunner, Layout, OutputInfo } from '../core/types';
import { DisplayCommandError } from '../core/errors';
import { xrandrArgs } from '../display/xrandr';
import { formatLayout } from '../engine/layout_format';

export function output(
  name: string,
  geometry: string | null,
  connected = true,
  preferredMode: string | null = null
): OutputInfo {
  if (geometry === null) return { name, connected, geometry: null, preferredMode, currentMode: null };
  const m = /^(\d+)x(\d+)\+(\d+)\+(\d+)$/.exec(geometry);
  if (!m) throw new Error(`bad geometry ${geometry}`);
  return {
    name,
    connected,
    geometry: { width: Number(m[1]), height: Number(m[2]), x: Number(m[3]), y: Number(m[4]) },
    preferredMode,
    currentMode: `${m[1]}x${m[2]}`
  };
}

/** Display server double: applied batches update the reported outputs. */
export class FakeDisplay implements DisplayControl {
  readonly applied: Layout[] = [];
  failWith: string | null = null;

  constructor(
    public outputs: OutputInfo[],
    public identities: Record<string, string> = {}
  ) {}

  listOutputs(): OutputInfo[] {
    return this.outputs.map(o => ({ ...o }));
  }

  readIdentity(name: string): string | null {
    return this.identities[name] ?? null;
  }

  apply(batch: Layout): void {
    if (this.failWith !== null) throw new DisplayCommandError(this.describe(batch), this.failWith);
    this.applied.push(batch);
    for (const directive of batch) {
      const target = this.outputs.find(o => o.name === directive.output);
      if (!target) continue;
      if (directive.off === true) {
        target.geometry = null;
        target.currentMode = null;
      } else {
        const [width, height] = directive.mode.split('x').map(Number);
        const [x, y] = directive.position.split('x').map(Number);
        target.geometry = { width, height, x, y };
        target.currentMode = directive.mode;
      }
    }
  }

  describe(batch: Layout): string {
    return ['xrandr', ...xrandrArgs(batch)].join(' ');
  }
}

export interface HookCall {
  executable: string;
  args: string[];
  env?: Record<string, string>;
}

/** Records hook invocations; exit status looked up by script path relative to the store root. */
export class FakeHookRunner implements HookRunner {
  readonly calls: HookCall[] = [];

  constructor(
    private readonly root: string,
    private readonly statuses: Record<string, number> = {}
  ) {}

  setStatus(relativePath: string, status: number): void {
    this.statuses[relativePath] = status;
  }

  run(executable: string, args: string[], env?: Record<string, string>): number {
    this.calls.push({ executable, args, env });
    return this.statuses[path.relative(this.root, executable)] ?? 0;
  }

  relativeCalls(): string[] {
    return this.calls.map(c => path.relative(this.root, c.executable));
  }
}

export function tempDir(prefix = 'autolayout-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Writes a profile directory by hand, as a user or an older run would have. */
export function writeProfileDir(
  root: string,
  name: string,
  records: { setup?: string; config?: Layout; hooks?: string[] }
): void {
  const dir = path.join(root, name);
  fs.mkdirSync(dir, { recursive: true });
  if (records.setup !== undefined) fs.writeFileSync(path.join(dir, 'setup'), `${records.setup}\n`);
  if (records.config !== undefined) fs.writeFileSync(path.join(dir, 'config'), formatLayout(records.config));
  for (const hook of records.hooks ?? []) writeScript(path.join(dir, hook));
}

export function writeScript(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '#!/bin/sh\nexit 0\n');
  fs.chmodSync(file, 0o755);
}
