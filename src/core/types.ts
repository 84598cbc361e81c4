/**
 * core/types.ts
 *
 * Shared types: layout directives, the display and hook collaborators,
 * configuration and the outcomes the engine reports.
 */

// ---------------------------------------------------------------------------
// Layout directives: one per output, mirrors the on-disk `config` file
// ---------------------------------------------------------------------------

export interface ActiveDirective {
  output: string;
  off?: false;
  mode: string;                            // "1920x1080"
  position: string;                        // "0x0"
}

export interface OffDirective {
  output: string;
  off: true;
}

export type OutputDirective = ActiveDirective | OffDirective;

export type Layout = OutputDirective[];

// ---------------------------------------------------------------------------
// Display control (talks to the X server)
// ---------------------------------------------------------------------------

export interface OutputGeometry {
  width: number;
  height: number;
  x: number;
  y: number;
}

export interface OutputInfo {
  name: string;
  connected: boolean;
  geometry: OutputGeometry | null;         // null when the output has no active mode
  preferredMode: string | null;            // "WxH" flagged as preferred, if reported
  currentMode: string | null;              // mode name flagged *current, unrotated
}

export interface DisplayControl {
  /** Every output the display server knows about, in its own order. */
  listOutputs(): OutputInfo[];

  /** Raw hardware identity (EDID hex) for an output, or null if unavailable. */
  readIdentity(output: string): string | null;

  /**
   * Apply all directives in a single call. Throws DisplayCommandError when
   * the underlying command fails.
   */
  apply(batch: Layout): void;

  /** The command line apply() would run, for dry runs and diagnostics. */
  describe(batch: Layout): string;
}

// ---------------------------------------------------------------------------
// Hook execution
// ---------------------------------------------------------------------------

export interface HookRunner {
  /**
   * Run an executable to completion and return its exit status.
   * A script that cannot be started or is killed by a signal reports a
   * non-zero status.
   */
  run(executable: string, args: string[], env?: Record<string, string>): number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AutolayoutConfig {
  profileDir: string;                      // root of the profile store
  defaultProfile?: string;                 // fallback when nothing matches
  force: boolean;                          // skip the idempotence check on --change
  dryRun: boolean;                         // report commands instead of running them
  logLevel: LogLevel;
  xrandrBin: string;
  commandTimeoutMs?: number;               // bound on xrandr calls; undefined = wait forever
  sysfsDrmDir: string;                     // where the sysfs EDID provider looks
  allowSynthesizedIdentity: boolean;       // enable the last-resort identity provider
}

// ---------------------------------------------------------------------------
// Selection & apply outcomes
// ---------------------------------------------------------------------------

export type Selection =
  | { kind: 'matched'; name: string }
  | { kind: 'fallback'; name: string }
  | { kind: 'none' };

export type SelectionEvent =
  | { type: 'considered'; name: string }
  | { type: 'blocked'; name: string }
  | { type: 'detected'; name: string };

export type ApplyOutcome =
  | { status: 'skipped-empty' }
  | { status: 'skipped-idempotent' }
  | { status: 'applied'; command: string; dryRun: boolean }
  | { status: 'failed'; error: Error };
