/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what the CLI prints next to the message and
 * what tests match against.
 */

export class AutolayoutError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Detection errors
// ---------------------------------------------------------------------------

/** No identity provider produced data for any connected output. */
export class NoIdentityDataError extends AutolayoutError {
  constructor(providers: string[]) {
    super(
      'Could not read hardware identity for any connected output',
      'NO_IDENTITY_DATA',
      { providers }
    );
  }
}

// ---------------------------------------------------------------------------
// Profile store errors
// ---------------------------------------------------------------------------

/** A profile directory lacks its `setup` or `config` record. */
export class MissingProfileRecordError extends AutolayoutError {
  constructor(profile: string, record: 'setup' | 'config') {
    super(
      `Profile "${profile}" has no ${record} record`,
      'MISSING_PROFILE_RECORD',
      { profile, record }
    );
  }
}

export class ProfileNotFoundError extends AutolayoutError {
  constructor(profile: string) {
    super(`Profile not found: "${profile}"`, 'PROFILE_NOT_FOUND', { profile });
  }
}

export class InvalidProfileNameError extends AutolayoutError {
  constructor(profile: string) {
    super(`Invalid profile name: "${profile}"`, 'INVALID_PROFILE_NAME', { profile });
  }
}

/** A `config` file contains a line the layout codec does not understand. */
export class LayoutFormatError extends AutolayoutError {
  constructor(line: number, text: string) {
    super(
      `Unrecognised layout line ${line}: "${text}"`,
      'LAYOUT_FORMAT',
      { line, text }
    );
  }
}

// ---------------------------------------------------------------------------
// Execution errors (display server / hooks)
// ---------------------------------------------------------------------------

/** The display-control batch call failed. */
export class DisplayCommandError extends AutolayoutError {
  constructor(command: string, diagnostic: string) {
    super(
      `Display command failed: ${diagnostic}`,
      'DISPLAY_COMMAND_FAILED',
      { command, diagnostic }
    );
  }
}

/** A block or postswitch script exited abnormally. */
export class HookError extends AutolayoutError {
  constructor(hookPath: string, status: number) {
    super(
      `Hook "${hookPath}" exited with status ${status}`,
      'HOOK_FAILED',
      { hookPath, status }
    );
  }
}

// ---------------------------------------------------------------------------
// Configuration / usage errors
// ---------------------------------------------------------------------------

export class ConfigError extends AutolayoutError {
  constructor(source: string, violations: unknown[]) {
    super(
      `Invalid configuration in "${source}"`,
      'CONFIG_INVALID',
      { source, violations }
    );
  }
}

export class UsageError extends AutolayoutError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}
