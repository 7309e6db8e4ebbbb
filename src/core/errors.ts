/*
Purpose: error types raised while resolving a build tree, plus the user-facing wrapper for CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new AmbiguousProjectError(paths); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class ResolverError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ResolverError";
  }
}

export class ConfigError extends ResolverError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ManifestError extends ResolverError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ManifestError";
  }
}

// =============================================================================
// PROJECT ERRORS
// =============================================================================

export class AmbiguousRuntimeConfigError extends ResolverError {
  constructor(public readonly files: string[]) {
    super(`Multiple .runtimeconfig.json files present: ${files.join(", ")}`);
    this.name = "AmbiguousRuntimeConfigError";
  }
}

export class AmbiguousProjectError extends ResolverError {
  constructor(
    public readonly candidates: string[],
    public readonly hintPath?: string,
  ) {
    const reason = hintPath
      ? `${hintPath} does not name a project under [config]`
      : "no .deployment file was used";
    super(`Multiple paths: [${candidates.join(", ")}] contain a project file, but ${reason}`);
    this.name = "AmbiguousProjectError";
  }
}

export class DeploymentHintError extends ResolverError {
  constructor(
    public readonly hintPath: string,
    cause?: unknown,
  ) {
    super(`Unable to read deployment hint ${hintPath}`, cause);
    this.name = "DeploymentHintError";
  }
}

export class MalformedDescriptorError extends ResolverError {
  constructor(
    public readonly descriptorPath: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Malformed project file ${descriptorPath}: ${detail}`, cause);
    this.name = "MalformedDescriptorError";
  }
}

export class RuntimeConfigError extends ResolverError {
  constructor(
    public readonly configPath: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Invalid runtime config ${configPath}: ${detail}`, cause);
    this.name = "RuntimeConfigError";
  }
}

// =============================================================================
// VERSION + INSTALL ERRORS
// =============================================================================

export class NoMatchingVersionError extends ResolverError {
  constructor(
    public readonly constraint: string,
    public readonly catalogSize: number,
  ) {
    super(`No match found for ${constraint} among ${catalogSize} available version(s)`);
    this.name = "NoMatchingVersionError";
  }
}

export class InstallFailureError extends ResolverError {
  constructor(
    public readonly dependency: string,
    public readonly version: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), cause);
    this.name = "InstallFailureError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  project: "PROJECT_ERROR",
  version: "VERSION_ERROR",
  install: "INSTALL_ERROR",
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
