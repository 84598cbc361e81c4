import { parseCli } from '../core/cli_args';
import { UsageError } from '../core/errors';

describe('parseCli', () => {
  it('should default to detection only', () => {
    expect(parseCli([])).toEqual({ action: 'detect', force: false, dryRun: false, debug: false });
  });

  it('should parse --change with --force and --default', () => {
    expect(parseCli(['--change', '--force', '--default', 'mobile'])).toEqual({
      action: 'change',
      force: true,
      dryRun: false,
      debug: false,
      defaultProfile: 'mobile'
    });
  });

  it.each([
    [['--save', 'docked'], 'save'],
    [['-s', 'docked'], 'save'],
    [['--load', 'docked'], 'load'],
    [['-l', 'docked'], 'load'],
    [['--remove', 'docked'], 'remove']
  ])('should take the profile name after %j', (argv, action) => {
    expect(parseCli(argv)).toMatchObject({ action, profile: 'docked' });
  });

  it('should accept short flags', () => {
    expect(parseCli(['-c', '-d', 'mobile'])).toMatchObject({ action: 'change', defaultProfile: 'mobile' });
    expect(parseCli(['-h']).action).toBe('help');
  });

  it('should reject two different actions', () => {
    expect(() => parseCli(['--save', 'a', '--load', 'b'])).toThrow('--load cannot be combined with --save');
  });

  it('should reject a missing value', () => {
    expect(() => parseCli(['--save'])).toThrow('--save requires a value');
    expect(() => parseCli(['--default', '--change'])).toThrow(UsageError);
  });

  it('should reject unknown options', () => {
    expect(() => parseCli(['--sav', 'x'])).toThrow('Unknown option: --sav');
  });

  it('should only allow --force with --change', () => {
    expect(() => parseCli(['--load', 'docked', '--force'])).toThrow('--force only applies to --change');
  });

  it('should allow --dry-run with --change and --load only', () => {
    expect(parseCli(['--load', 'docked', '--dry-run']).dryRun).toBe(true);
    expect(() => parseCli(['--save', 'docked', '--dry-run'])).toThrow(UsageError);
  });
});
