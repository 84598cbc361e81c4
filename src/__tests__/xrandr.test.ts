import * as fs from 'fs';
import * as path from 'path';
import { execFileSync } from 'child_process';
import { XrandrDisplay } from '../display/xrandr';
import { parseXrandrVerbose } from '../display/xrandr_parser';
import { DisplayCommandError } from '../core/errors';

jest.mock('child_process');

const VERBOSE = fs.readFileSync(path.join(__dirname, 'fixtures', 'xrandr-verbose.txt'), 'utf-8');

describe('parseXrandrVerbose', () => {
  const outputs = parseXrandrVerbose(VERBOSE);

  it('should list every output in xrandr order', () => {
    expect(outputs.map(o => o.name)).toEqual(['eDP-1', 'HDMI-1', 'DP-1', 'DP-2', 'HDMI-2']);
  });

  it('should read connection state and active geometry', () => {
    expect(outputs[0]).toMatchObject({
      connected: true,
      geometry: { width: 1920, height: 1080, x: 0, y: 0 },
      preferredMode: '1920x1080'
    });
    expect(outputs[1].geometry).toEqual({ width: 1920, height: 1080, x: 1920, y: 0 });
    expect(outputs[2]).toMatchObject({ connected: false, geometry: null, preferredMode: null });
  });

  it('should treat a connected output without a mode as inactive', () => {
    expect(outputs[3]).toMatchObject({
      connected: true,
      geometry: null,
      preferredMode: '2560x1440',
      currentMode: null
    });
  });

  it('should keep the unrotated mode name apart from the rotated geometry', () => {
    expect(outputs[4]).toMatchObject({
      name: 'HDMI-2',
      geometry: { width: 1080, height: 1920, x: 3840, y: 0 },
      currentMode: '1920x1080'
    });
    expect(outputs[0].currentMode).toBe('1920x1080');
  });

  it('should join multi-line EDID blocks into lowercase hex', () => {
    expect(outputs[0].edid).toBe('00ffffffffffff0030e4d8020000000000160104951f1178ea');
    expect(outputs[1].edid).toBe('00ffffffffffff0010acdeadbeef0000');
    expect(outputs[2].edid).toBeNull();
    expect(outputs[3].edid).toBeNull();
    expect(outputs[4].edid).toBeNull();
  });
});

describe('XrandrDisplay', () => {
  const mockExecFileSync = jest.mocked(execFileSync);
  let display: XrandrDisplay;

  beforeEach(() => {
    jest.clearAllMocks();
    display = new XrandrDisplay({ xrandrBin: 'xrandr' });
  });

  it('should query outputs with xrandr --verbose', () => {
    mockExecFileSync.mockReturnValue(VERBOSE);

    const outputs = display.listOutputs();

    expect(outputs).toHaveLength(5);
    expect(outputs[1]).toEqual({
      name: 'HDMI-1',
      connected: true,
      geometry: { width: 1920, height: 1080, x: 1920, y: 0 },
      preferredMode: '1920x1080',
      currentMode: '1920x1080'
    });
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'xrandr',
      ['--verbose'],
      expect.objectContaining({ encoding: 'utf-8' })
    );
  });

  it('should pass the configured command timeout to xrandr', () => {
    mockExecFileSync.mockReturnValue(VERBOSE);

    new XrandrDisplay({ xrandrBin: '/usr/bin/xrandr', commandTimeoutMs: 5000 }).listOutputs();

    expect(mockExecFileSync).toHaveBeenCalledWith(
      '/usr/bin/xrandr',
      ['--verbose'],
      expect.objectContaining({ timeout: 5000 })
    );
  });

  it('should answer identity reads from the last query', () => {
    mockExecFileSync.mockReturnValue(VERBOSE);

    display.listOutputs();
    expect(display.readIdentity('HDMI-1')).toBe('00ffffffffffff0010acdeadbeef0000');
    expect(display.readIdentity('DP-1')).toBeNull();
    expect(display.readIdentity('VGA-9')).toBeNull();
    expect(mockExecFileSync).toHaveBeenCalledTimes(1);
  });

  it('should send the whole layout in a single xrandr call', () => {
    mockExecFileSync.mockReturnValue('');

    display.apply([
      { output: 'eDP-1', off: true },
      { output: 'HDMI-1', mode: '1920x1080', position: '0x0' }
    ]);

    expect(mockExecFileSync).toHaveBeenCalledTimes(1);
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'xrandr',
      ['--output', 'eDP-1', '--off', '--output', 'HDMI-1', '--mode', '1920x1080', '--pos', '0x0'],
      expect.anything()
    );
  });

  it('should not call xrandr for an empty batch', () => {
    display.apply([]);
    expect(mockExecFileSync).not.toHaveBeenCalled();
  });

  it('should surface xrandr stderr as a DisplayCommandError', () => {
    mockExecFileSync.mockImplementation(() => {
      throw Object.assign(new Error('Command failed'), { stderr: 'xrandr: cannot find mode 9999x9999\n' });
    });

    const batch = [{ output: 'HDMI-1', mode: '9999x9999', position: '0x0' }];
    expect(() => display.apply(batch)).toThrow(DisplayCommandError);
    expect(() => display.apply(batch)).toThrow('Display command failed: xrandr: cannot find mode 9999x9999');
  });

  it('should describe the command a batch would run', () => {
    expect(display.describe([{ output: 'DP-1', mode: '2560x1440', position: '1920x0' }]))
      .toBe('xrandr --output DP-1 --mode 2560x1440 --pos 1920x0');
  });
});
