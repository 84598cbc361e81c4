/**
 * core/cli_args.ts
 *
 * Command-line parsing for the autolayout binary. Exactly one action per
 * invocation; running without an action only reports the detected profile.
 */

import { UsageError } from './errors';

export type CliAction =
  | 'detect'
  | 'change'
  | 'save'
  | 'load'
  | 'remove'
  | 'list'
  | 'fingerprint'
  | 'help';

export interface CliOptions {
  action: CliAction;
  profile?: string;                        // --save / --load / --remove target
  defaultProfile?: string;
  force: boolean;
  dryRun: boolean;
  debug: boolean;
  configPath?: string;
}

export const USAGE = `Usage: autolayout [options]

Actions (pick one):
  -c, --change            apply the profile matching the connected displays
  -s, --save <name>       save the current layout as <name>
  -l, --load <name>       apply <name> unconditionally
      --remove <name>     delete the saved profile <name>
      --list              list saved profiles, marking the current one
      --fingerprint       print the fingerprint of the connected displays
  -h, --help              show this help
  (none)                  report which profile would be selected

Options:
  -d, --default <name>    profile to use when nothing matches
      --force             with --change, reapply even if already active
      --dry-run           print the xrandr command instead of running it
      --config <path>     read settings from <path>
      --debug             verbose logging on stderr
`;

const ACTIONS_WITH_PROFILE = new Map<string, CliAction>([
  ['--save', 'save'],
  ['-s', 'save'],
  ['--load', 'load'],
  ['-l', 'load'],
  ['--remove', 'remove']
]);

const ACTIONS = new Map<string, CliAction>([
  ['--change', 'change'],
  ['-c', 'change'],
  ['--list', 'list'],
  ['--fingerprint', 'fingerprint'],
  ['--help', 'help'],
  ['-h', 'help']
]);

function pickAction(current: CliAction | undefined, flag: string, next: CliAction): CliAction {
  if (current !== undefined && current !== next) {
    throw new UsageError(`${flag} cannot be combined with --${current}`);
  }
  return next;
}

export function parseCli(argv: string[]): CliOptions {
  let action: CliAction | undefined;
  const options: CliOptions = { action: 'detect', force: false, dryRun: false, debug: false };

  const valueOf = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const profileAction = ACTIONS_WITH_PROFILE.get(arg);
    if (profileAction) {
      action = pickAction(action, arg, profileAction);
      options.profile = valueOf(arg, i);
      i++;
      continue;
    }

    const plainAction = ACTIONS.get(arg);
    if (plainAction) {
      action = pickAction(action, arg, plainAction);
      continue;
    }

    switch (arg) {
      case '--default':
      case '-d':
        options.defaultProfile = valueOf(arg, i);
        i++;
        break;
      case '--config':
        options.configPath = valueOf(arg, i);
        i++;
        break;
      case '--force':
        options.force = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  options.action = action ?? 'detect';

  if (options.force && options.action !== 'change') {
    throw new UsageError('--force only applies to --change');
  }
  if (options.dryRun && options.action !== 'change' && options.action !== 'load') {
    throw new UsageError('--dry-run only applies to --change and --load');
  }

  return options;
}
