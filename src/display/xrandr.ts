/**
 * display/xrandr.ts
 *
 * DisplayControl backed by the xrandr binary.
 * Queries use `xrandr --verbose` (geometry, preferred mode and EDID in
 * one call). Layout changes are sent as a single xrandr invocation so
 * the X server applies every output change together.
 */

import { execFileSync } from 'child_process';
import { AutolayoutConfig, DisplayControl, Layout, OutputInfo } from '../core/types';
import { DisplayCommandError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ParsedOutput, parseXrandrVerbose } from './xrandr_parser';

function diagnosticOf(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'stderr' in e) {
    const stderr = String(e.stderr ?? '').trim();
    if (stderr) return stderr;
  }
  return e instanceof Error ? e.message : String(e);
}

/** xrandr arguments for a batch, without the binary name. */
export function xrandrArgs(batch: Layout): string[] {
  const args: string[] = [];
  for (const directive of batch) {
    args.push('--output', directive.output);
    if (directive.off === true) {
      args.push('--off');
    } else {
      args.push('--mode', directive.mode, '--pos', directive.position);
    }
  }
  return args;
}

export class XrandrDisplay implements DisplayControl {
  private readonly log = scopedLogger('display/xrandr');
  private lastQuery: ParsedOutput[] | null = null;

  constructor(private readonly config: Pick<AutolayoutConfig, 'xrandrBin' | 'commandTimeoutMs'>) {}

  private run(args: string[]): string {
    try {
      return execFileSync(this.config.xrandrBin, args, {
        encoding: 'utf-8',
        timeout: this.config.commandTimeoutMs,
        stdio: ['ignore', 'pipe', 'pipe']
      });
    } catch (e) {
      throw new DisplayCommandError([this.config.xrandrBin, ...args].join(' '), diagnosticOf(e));
    }
  }

  private query(): ParsedOutput[] {
    this.lastQuery = parseXrandrVerbose(this.run(['--verbose']));
    this.log.debug({ outputs: this.lastQuery.map(o => o.name) }, 'Queried outputs');
    return this.lastQuery;
  }

  listOutputs(): OutputInfo[] {
    return this.query().map(({ name, connected, geometry, preferredMode, currentMode }) => ({
      name,
      connected,
      geometry,
      preferredMode,
      currentMode
    }));
  }

  readIdentity(output: string): string | null {
    const outputs = this.lastQuery ?? this.query();
    return outputs.find(o => o.name === output)?.edid ?? null;
  }

  apply(batch: Layout): void {
    if (batch.length === 0) return;
    const args = xrandrArgs(batch);
    this.log.info({ args }, 'Applying layout');
    this.run(args);
    this.lastQuery = null;
  }

  describe(batch: Layout): string {
    return [this.config.xrandrBin, ...xrandrArgs(batch)].join(' ');
  }
}
