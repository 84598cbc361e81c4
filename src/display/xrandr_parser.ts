/**
 * display/xrandr_parser.ts
 *
 * Parses `xrandr --verbose` output into OutputInfo records plus the EDID
 * hex block of each output. Pure functions; no process access here.
 *
 * The header geometry is the rotated size on screen; the mode name to pass
 * back to `--mode` comes from the line flagged `*current`.
 */

import { OutputGeometry, OutputInfo } from '../core/types';

export interface ParsedOutput extends OutputInfo {
  edid: string | null;
}

const HEADER_RE = /^(\S+) (connected|disconnected|unknown connection)(.*)$/;
const GEOMETRY_RE = /(\d+)x(\d+)\+(-?\d+)\+(-?\d+)/;
const MODE_LINE_RE = /^\s+(\S+) \(0x[0-9a-fA-F]+\)(.*)$/;
const HEX_RE = /^[0-9a-fA-F]+$/;

function parseGeometry(rest: string): OutputGeometry | null {
  const m = GEOMETRY_RE.exec(rest);
  if (!m) return null;
  return {
    width: parseInt(m[1], 10),
    height: parseInt(m[2], 10),
    x: parseInt(m[3], 10),
    y: parseInt(m[4], 10)
  };
}

export function parseXrandrVerbose(text: string): ParsedOutput[] {
  const outputs: ParsedOutput[] = [];
  let current: ParsedOutput | null = null;
  let edidChunks: string[] | null = null;

  const flushEdid = (): void => {
    if (current && edidChunks) {
      current.edid = edidChunks.length > 0 ? edidChunks.join('').toLowerCase() : null;
    }
    edidChunks = null;
  };

  for (const line of text.split('\n')) {
    if (edidChunks) {
      const trimmed = line.trim();
      if (trimmed.length > 0 && HEX_RE.test(trimmed)) {
        edidChunks.push(trimmed);
        continue;
      }
      flushEdid();
    }

    if (line.startsWith('Screen ')) continue;

    const header = HEADER_RE.exec(line);
    if (header) {
      current = {
        name: header[1],
        connected: header[2] === 'connected',
        geometry: parseGeometry(header[3]),
        preferredMode: null,
        currentMode: null,
        edid: null
      };
      outputs.push(current);
      continue;
    }

    if (!current) continue;

    if (line.trim() === 'EDID:') {
      edidChunks = [];
      continue;
    }

    const mode = MODE_LINE_RE.exec(line);
    if (!mode) continue;
    if (current.preferredMode === null && mode[2].includes('+preferred')) {
      current.preferredMode = mode[1];
    }
    if (current.currentMode === null && mode[2].includes('*current')) {
      current.currentMode = mode[1];
    }
  }
  flushEdid();

  return outputs;
}
