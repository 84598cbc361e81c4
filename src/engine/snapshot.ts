/**
 * engine/snapshot.ts
 *
 * Describes the live layout in the same directive form profiles store.
 */

import { DisplayControl, Layout, OutputInfo, OutputDirective } from '../core/types';

export function directiveFor(output: OutputInfo): OutputDirective {
  if (!output.connected || !output.geometry) {
    return { output: output.name, off: true };
  }
  const { width, height, x, y } = output.geometry;
  const mode = output.currentMode ?? `${width}x${height}`;
  return { output: output.name, mode, position: `${x}x${y}` };
}

export class LayoutSnapshotter {
  constructor(private readonly display: DisplayControl) {}

  snapshot(): Layout {
    return this.display.listOutputs().map(directiveFor);
  }
}
