/**
 * core/config.ts
 *
 * Builds the AutolayoutConfig once at process start. Layers, later wins:
 *   1. Built-in defaults
 *   2. Environment (AUTOLAYOUT_* variables, optionally from a .env file)
 *   3. JSON config file (<profileDir>/autolayout.json or --config),
 *      validated with ajv
 *   4. CLI overrides
 *
 * The result is passed explicitly to every component; nothing reads
 * process.env after this point.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Ajv from 'ajv';
import { AutolayoutConfig, LogLevel } from './types';
import { ConfigError } from './errors';

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const CONFIG_FILE_NAME = 'autolayout.json';

/** Shape accepted in the JSON config file. */
export interface FileConfig {
  profileDir?: string;
  defaultProfile?: string;
  logLevel?: LogLevel;
  xrandrBin?: string;
  commandTimeoutMs?: number;
  sysfsDrmDir?: string;
  allowSynthesizedIdentity?: boolean;
}

const fileConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    profileDir: { type: 'string', minLength: 1 },
    defaultProfile: { type: 'string', minLength: 1 },
    logLevel: { type: 'string', enum: LOG_LEVELS },
    xrandrBin: { type: 'string', minLength: 1 },
    commandTimeoutMs: { type: 'integer', minimum: 1 },
    sysfsDrmDir: { type: 'string', minLength: 1 },
    allowSynthesizedIdentity: { type: 'boolean' }
  }
};

const ajv = new Ajv({ allErrors: true });
const validateFileConfig = ajv.compile<FileConfig>(fileConfigSchema);

/**
 * Load a .env file from the working directory into process.env.
 * Missing file is not an error.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  const envPath = path.resolve(cwd, '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

function defaultProfileDir(env: NodeJS.ProcessEnv): string {
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && xdg.length > 0 ? xdg : path.join(os.homedir(), '.config');
  return path.join(base, 'autolayout');
}

function readFileConfig(filePath: string, required: boolean): FileConfig {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(filePath, [{ message: 'file does not exist' }]);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(filePath, [{ message: (e as Error).message }]);
  }

  if (!validateFileConfig(raw)) {
    throw new ConfigError(filePath, validateFileConfig.errors ?? []);
  }
  return raw;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;                     // explicit --config; must exist
  overrides?: Partial<AutolayoutConfig>;
}

export function loadConfig(options: LoadConfigOptions = {}): AutolayoutConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let envLevel: LogLevel | undefined;
  const rawLevel = env.AUTOLAYOUT_LOG_LEVEL;
  if (rawLevel) {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigError('AUTOLAYOUT_LOG_LEVEL', [{ message: `unknown level "${rawLevel}"` }]);
    }
    envLevel = rawLevel;
  }

  const envProfileDir = env.AUTOLAYOUT_PROFILE_DIR || undefined;
  const baseProfileDir = overrides.profileDir ?? envProfileDir ?? defaultProfileDir(env);

  const fileConfig = options.configPath
    ? readFileConfig(path.resolve(options.configPath), true)
    : readFileConfig(path.join(baseProfileDir, CONFIG_FILE_NAME), false);

  return {
    profileDir: overrides.profileDir ?? fileConfig.profileDir ?? baseProfileDir,
    defaultProfile: overrides.defaultProfile ?? fileConfig.defaultProfile ?? (env.AUTOLAYOUT_DEFAULT || undefined),
    force: overrides.force ?? false,
    dryRun: overrides.dryRun ?? false,
    logLevel: overrides.logLevel ?? fileConfig.logLevel ?? envLevel ?? 'warn',
    xrandrBin: overrides.xrandrBin ?? fileConfig.xrandrBin ?? (env.AUTOLAYOUT_XRANDR || 'xrandr'),
    commandTimeoutMs: overrides.commandTimeoutMs ?? fileConfig.commandTimeoutMs,
    sysfsDrmDir: overrides.sysfsDrmDir ?? fileConfig.sysfsDrmDir ?? '/sys/class/drm',
    allowSynthesizedIdentity:
      overrides.allowSynthesizedIdentity ?? fileConfig.allowSynthesizedIdentity ?? true
  };
}
