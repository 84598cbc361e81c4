#!/usr/bin/env node
/**
 * cli.ts
 *
 * Entry point. Orchestrates one run:
 *   1. Parse CLI args
 *   2. Load config (.env, config file, CLI overrides) and init the logger
 *   3. Build the engine around the display and hook collaborators
 *   4. Run the requested action and map its outcome to an exit status
 *
 * Exit status: 0 on success, 1 when nothing matched / apply failed /
 * a profile error occurred, 2 on usage errors.
 */

import { AutolayoutConfig, DisplayControl, HookRunner, SelectionEvent } from './core/types';
import {
  AutolayoutError,
  MissingProfileRecordError,
  NoIdentityDataError,
  ProfileNotFoundError,
  UsageError
} from './core/errors';
import { CliOptions, parseCli, USAGE } from './core/cli_args';
import { loadConfig, loadEnvFile } from './core/config';
import { initLogger, scopedLogger } from './core/logger';
import { ProcessHookRunner } from './core/hooks';
import { XrandrDisplay } from './display/xrandr';
import { defaultProviders, HardwareFingerprinter } from './engine/fingerprint';
import { LayoutSnapshotter } from './engine/snapshot';
import { ProfileStore } from './engine/profile_store';
import { BlockGate } from './engine/block_gate';
import { ProfileMatcher } from './engine/matcher';
import { ApplyEngine } from './engine/apply';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

/** Collaborators a caller may substitute; the rest come from config. */
export interface CliDeps {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  display?: (config: AutolayoutConfig) => DisplayControl;
  hooks?: (config: AutolayoutConfig) => HookRunner;
}

const processIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

interface Engine {
  config: AutolayoutConfig;
  store: ProfileStore;
  fingerprinter: HardwareFingerprinter;
  snapshotter: LayoutSnapshotter;
  matcher: (onEvent: (event: SelectionEvent) => void) => ProfileMatcher;
  applier: ApplyEngine;
}

function buildEngine(config: AutolayoutConfig, deps: CliDeps): Engine {
  const display = deps.display ? deps.display(config) : new XrandrDisplay(config);
  const hooks = deps.hooks ? deps.hooks(config) : new ProcessHookRunner();

  const store = new ProfileStore(config.profileDir, hooks);
  const gate = new BlockGate(store);
  const snapshotter = new LayoutSnapshotter(display);

  return {
    config,
    store,
    fingerprinter: new HardwareFingerprinter(display, defaultProviders(display, config)),
    snapshotter,
    matcher: onEvent => new ProfileMatcher(store, gate, { defaultProfile: config.defaultProfile, onEvent }),
    applier: new ApplyEngine(store, display, snapshotter)
  };
}

function requireProfile(options: CliOptions): string {
  if (!options.profile) throw new UsageError(`--${options.action} requires a profile name`);
  return options.profile;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/** Current fingerprint, or null when the hardware cannot be identified. */
function currentFingerprint(engine: Engine): string | null {
  try {
    return engine.fingerprinter.fingerprint();
  } catch (e) {
    if (!(e instanceof NoIdentityDataError)) throw e;
    scopedLogger('cli').warn({ code: e.code }, 'Unknown hardware, no profile can match');
    return null;
  }
}

function runFingerprint(engine: Engine, io: CliIo): number {
  io.out(engine.fingerprinter.fingerprint());
  return 0;
}

function runSave(engine: Engine, options: CliOptions, io: CliIo): number {
  const name = requireProfile(options);
  const fingerprint = engine.fingerprinter.fingerprint();
  engine.store.writeProfile(name, fingerprint, engine.snapshotter.snapshot());
  io.out(`Saved current configuration as profile '${name}'`);
  return 0;
}

function runRemove(engine: Engine, options: CliOptions, io: CliIo): number {
  const name = requireProfile(options);
  engine.store.removeProfile(name);
  io.out(`Removed profile '${name}'`);
  return 0;
}

function runList(engine: Engine, io: CliIo): number {
  const fingerprint = currentFingerprint(engine);
  for (const name of engine.store.listProfiles()) {
    const matches = fingerprint !== null && engine.store.readFingerprint(name) === fingerprint;
    io.out(matches ? `${name} (current)` : name);
  }
  return 0;
}

function applyAndReport(engine: Engine, name: string, force: boolean, io: CliIo): number {
  const outcome = engine.applier.apply(name, { force, dryRun: engine.config.dryRun });

  switch (outcome.status) {
    case 'skipped-empty':
      io.err(`Profile '${name}' has no layout to apply`);
      return 1;
    case 'skipped-idempotent':
      io.out(`Profile '${name}' is already active`);
      return 0;
    case 'applied':
      io.out(outcome.dryRun ? outcome.command : `Switched to profile '${name}'`);
      return 0;
    case 'failed':
      io.err(`Failed to apply profile '${name}': ${outcome.error.message}`);
      return 1;
  }
}

function runLoad(engine: Engine, options: CliOptions, io: CliIo): number {
  const name = requireProfile(options);
  if (!engine.store.exists(name)) throw new ProfileNotFoundError(name);
  if (engine.store.readLayout(name).length === 0) throw new MissingProfileRecordError(name, 'config');
  return applyAndReport(engine, name, true, io);
}

/** Prints one line per considered profile, suffixed when blocked or detected. */
function selectionPrinter(io: CliIo): { onEvent: (event: SelectionEvent) => void; flush: () => void } {
  let pending: string | null = null;
  const flush = (): void => {
    if (pending !== null) io.out(pending);
    pending = null;
  };
  return {
    onEvent: event => {
      switch (event.type) {
        case 'considered':
          flush();
          pending = event.name;
          break;
        case 'blocked':
          pending = `${event.name} (blocked)`;
          flush();
          break;
        case 'detected':
          pending = `${event.name} (detected)`;
          flush();
          break;
      }
    },
    flush
  };
}

function runChange(engine: Engine, options: CliOptions, io: CliIo, apply: boolean): number {
  const fingerprint = currentFingerprint(engine);
  const printer = selectionPrinter(io);
  const selection = engine.matcher(printer.onEvent).select(fingerprint);
  printer.flush();

  if (selection.kind === 'none') {
    io.err('No matching profile found');
    return 1;
  }
  if (selection.kind === 'fallback') {
    io.out(`No profile matched, using default '${selection.name}'`);
  }
  if (!apply) return 0;

  return applyAndReport(engine, selection.name, options.force, io);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export function run(argv: string[], deps: CliDeps = {}): number {
  const io = deps.io ?? processIo;

  try {
    const options = parseCli(argv);
    const { action } = options;
    if (action === 'help') {
      io.out(USAGE);
      return 0;
    }

    if (!deps.env) loadEnvFile();
    const config = loadConfig({
      env: deps.env,
      configPath: options.configPath,
      overrides: {
        defaultProfile: options.defaultProfile,
        force: options.force,
        dryRun: options.dryRun,
        ...(options.debug ? { logLevel: 'debug' as const } : {})
      }
    });
    initLogger(config);
    scopedLogger('cli').debug({ action, profileDir: config.profileDir }, 'Starting');

    const engine = buildEngine(config, deps);

    switch (action) {
      case 'fingerprint': return runFingerprint(engine, io);
      case 'save':        return runSave(engine, options, io);
      case 'load':        return runLoad(engine, options, io);
      case 'remove':      return runRemove(engine, options, io);
      case 'list':        return runList(engine, io);
      case 'change':      return runChange(engine, options, io, true);
      case 'detect':      return runChange(engine, options, io, false);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`autolayout: ${e.message}`);
      io.err(USAGE);
      return 2;
    }
    if (e instanceof AutolayoutError) {
      io.err(`autolayout: ${e.message} [${e.code}]`);
      return 1;
    }
    const message = e instanceof Error ? e.message : String(e);
    scopedLogger('cli').error({ error: message }, 'Unexpected failure');
    io.err(`autolayout: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
