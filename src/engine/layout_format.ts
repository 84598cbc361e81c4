/**
 * engine/layout_format.ts
 *
 * Text codec for layouts, shared by the profile store (`config` files)
 * and the snapshotter, so stored and live layouts compare as strings.
 *
 *   output HDMI-1        output eDP-1
 *   mode 1920x1080       off
 *   pos 0x0
 */

import { Layout, OutputDirective } from '../core/types';
import { LayoutFormatError } from '../core/errors';

export function formatDirective(directive: OutputDirective): string[] {
  if (directive.off === true) {
    return [`output ${directive.output}`, 'off'];
  }
  return [
    `output ${directive.output}`,
    `mode ${directive.mode}`,
    `pos ${directive.position}`
  ];
}

export function formatLayout(layout: Layout): string {
  return layout.flatMap(formatDirective).map(line => `${line}\n`).join('');
}

interface PartialDirective {
  output: string;
  off: boolean;
  mode?: string;
  position?: string;
  line: number;
}

function finish(partial: PartialDirective): OutputDirective {
  if (partial.off) return { output: partial.output, off: true };
  if (partial.mode === undefined || partial.position === undefined) {
    throw new LayoutFormatError(partial.line, `output ${partial.output}`);
  }
  return { output: partial.output, mode: partial.mode, position: partial.position };
}

export function parseLayout(text: string): Layout {
  const layout: Layout = [];
  let current: PartialDirective | null = null;

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const trimmed = lines[i].trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const [keyword, ...rest] = trimmed.split(/\s+/);
    const value = rest.join(' ');

    if (keyword === 'output' && value) {
      if (current) layout.push(finish(current));
      current = { output: value, off: false, line: lineNo };
      continue;
    }

    if (!current) throw new LayoutFormatError(lineNo, trimmed);

    if (keyword === 'off' && !value) {
      current.off = true;
    } else if (keyword === 'mode' && value) {
      current.mode = value;
    } else if (keyword === 'pos' && value) {
      current.position = value;
    } else {
      throw new LayoutFormatError(lineNo, trimmed);
    }
  }
  if (current) layout.push(finish(current));

  return layout;
}

/** Exact comparison through the shared textual form. */
export function layoutsEqual(a: Layout, b: Layout): boolean {
  return formatLayout(a) === formatLayout(b);
}
