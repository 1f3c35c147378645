/*
Purpose: core error types used across graph building, scheduling and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("..."); throw new DependencyCycleError(message, participants).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class JauntError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "JauntError";
  }
}

export class ConfigError extends JauntError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DiscoveryError extends JauntError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DiscoveryError";
  }
}

export class InvalidUnitRefError extends JauntError {
  constructor(
    public readonly raw: string,
    reason: string,
  ) {
    super(`Invalid unit reference ${JSON.stringify(raw)}: ${reason}`);
    this.name = "InvalidUnitRefError";
  }
}

export class DependencyCycleError extends JauntError {
  public readonly participants: string[];

  constructor(message: string, participants: Iterable<string>) {
    super(message);
    this.name = "DependencyCycleError";
    this.participants = Array.from(new Set(participants)).sort();
  }
}

export class ArtifactPathError extends JauntError {
  constructor(
    public readonly targetPath: string,
    public readonly root: string,
  ) {
    super(`Refusing to write ${targetPath} outside ${root}.`);
    this.name = "ArtifactPathError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  cycle: "CYCLE_ERROR",
  build: "BUILD_ERROR",
  discovery: "DISCOVERY_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
