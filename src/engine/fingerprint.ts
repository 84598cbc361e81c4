/**
 * engine/fingerprint.ts
 *
 * Computes a stable identity string for the connected display hardware.
 *
 * Identity comes from an ordered list of providers. The first provider
 * that yields data for any connected output is used for all outputs;
 * results from different providers are never mixed. Pairs are sorted by
 * output name so enumeration order of the display server does not leak
 * into the fingerprint.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AutolayoutConfig, DisplayControl, OutputInfo } from '../core/types';
import { NoIdentityDataError } from '../core/errors';
import { scopedLogger } from '../core/logger';

export interface IdentityProvider {
  readonly name: string;
  /** Identity blob for a connected output, or null/empty when unavailable. */
  identify(output: OutputInfo): string | null;
}

// ---------------------------------------------------------------------------
// Providers, most preferred first
// ---------------------------------------------------------------------------

/** EDID as reported by the display server itself. */
export class DisplayEdidProvider implements IdentityProvider {
  readonly name = 'xrandr-edid';

  constructor(private readonly display: DisplayControl) {}

  identify(output: OutputInfo): string | null {
    return this.display.readIdentity(output.name);
  }
}

/**
 * EDID read from the kernel's DRM connectors, e.g.
 * /sys/class/drm/card0-HDMI-A-1/edid. xrandr and DRM name connectors
 * differently ("HDMI-1" vs "HDMI-A-1"), so a connector matches when its
 * name with the type letter dropped equals the output name.
 */
export class SysfsEdidProvider implements IdentityProvider {
  readonly name = 'sysfs-edid';

  constructor(private readonly drmDir: string) {}

  private connectorNames(output: string): Set<string> {
    const names = new Set([output]);
    const m = /^([A-Za-z]+)-(\d+)$/.exec(output);
    if (m) {
      for (const letter of ['A', 'B']) names.add(`${m[1]}-${letter}-${m[2]}`);
    }
    return names;
  }

  identify(output: OutputInfo): string | null {
    if (!fs.existsSync(this.drmDir)) return null;

    const wanted = this.connectorNames(output.name);
    const entries = fs.readdirSync(this.drmDir).sort();
    for (const entry of entries) {
      const m = /^card\d+-(.+)$/.exec(entry);
      if (!m || !wanted.has(m[1])) continue;

      const edidPath = path.join(this.drmDir, entry, 'edid');
      if (!fs.existsSync(edidPath)) continue;
      const blob = fs.readFileSync(edidPath);
      if (blob.length > 0) return blob.toString('hex');
    }
    return null;
  }
}

/** Last resort: output name plus preferred mode. */
export class SynthesizedIdentityProvider implements IdentityProvider {
  readonly name = 'synthesized';

  identify(output: OutputInfo): string | null {
    return output.preferredMode ? `${output.name}@${output.preferredMode}` : null;
  }
}

export function defaultProviders(
  display: DisplayControl,
  config: Pick<AutolayoutConfig, 'sysfsDrmDir' | 'allowSynthesizedIdentity'>
): IdentityProvider[] {
  const providers: IdentityProvider[] = [
    new DisplayEdidProvider(display),
    new SysfsEdidProvider(config.sysfsDrmDir)
  ];
  if (config.allowSynthesizedIdentity) providers.push(new SynthesizedIdentityProvider());
  return providers;
}

// ---------------------------------------------------------------------------
// Fingerprinter
// ---------------------------------------------------------------------------

export class HardwareFingerprinter {
  private readonly log = scopedLogger('engine/fingerprint');

  constructor(
    private readonly display: DisplayControl,
    private readonly providers: IdentityProvider[]
  ) {}

  fingerprint(): string {
    const connected = this.display
      .listOutputs()
      .filter(o => o.connected)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const provider of this.providers) {
      const pairs: string[] = [];
      for (const output of connected) {
        const blob = provider.identify(output);
        if (blob) pairs.push(`${output.name}=${blob}`);
      }
      if (pairs.length > 0) {
        this.log.debug({ provider: provider.name, outputs: pairs.length }, 'Fingerprint computed');
        return pairs.join(' ');
      }
      this.log.debug({ provider: provider.name }, 'Provider returned no identity data');
    }

    throw new NoIdentityDataError(this.providers.map(p => p.name));
  }
}
