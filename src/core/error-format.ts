/*
Purpose: map resolver errors onto user-facing errors and render them as CLI lines.
Assumptions: debug mode may include stack traces.
Usage: formatErrorLines(err, { mode: "debug" }).map((line) => line.text).
*/

import {
  AmbiguousProjectError,
  AmbiguousRuntimeConfigError,
  ConfigError,
  DeploymentHintError,
  InstallFailureError,
  MalformedDescriptorError,
  ManifestError,
  NoMatchingVersionError,
  RuntimeConfigError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

// =============================================================================
// ERROR MAPPING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError(describeError(error));
}

function describeError(error: unknown): UserFacingErrorInput {
  if (error instanceof AmbiguousRuntimeConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.project,
      title: "Multiple runtime configs found.",
      message: error.message,
      hint: "Publish a single application into the build root.",
      cause: error,
    };
  }

  if (error instanceof AmbiguousProjectError) {
    return {
      code: USER_FACING_ERROR_CODES.project,
      title: "Multiple project files found.",
      message: error.message,
      hint: "Add a .deployment file with a [config] section naming the project to run.",
      next: "[config]\nproject = ./path/to/app.csproj",
      cause: error,
    };
  }

  if (error instanceof DeploymentHintError) {
    return {
      code: USER_FACING_ERROR_CODES.project,
      title: "Deployment hint unreadable.",
      message: error.message,
      hint: "Check that .deployment is a valid INI file.",
      cause: error,
    };
  }

  if (error instanceof MalformedDescriptorError) {
    return {
      code: USER_FACING_ERROR_CODES.project,
      title: "Project file could not be parsed.",
      message: error.message,
      hint: "Fix the XML in the project file before deploying.",
      cause: error,
    };
  }

  if (error instanceof RuntimeConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.project,
      title: "Runtime config invalid.",
      message: error.message,
      cause: error,
    };
  }

  if (error instanceof NoMatchingVersionError) {
    return {
      code: USER_FACING_ERROR_CODES.version,
      title: "No matching framework version.",
      message: error.message,
      hint: "Target a framework version listed in the buildpack manifest.",
      cause: error,
    };
  }

  if (error instanceof InstallFailureError) {
    return {
      code: USER_FACING_ERROR_CODES.install,
      title: `Installing ${error.dependency} ${error.version} failed.`,
      message: error.message,
      cause: error.cause,
    };
  }

  if (error instanceof ConfigError || error instanceof ManifestError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: error instanceof ManifestError ? "Manifest invalid." : "Config invalid.",
      message: error.message,
      cause: error,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: formatErrorMessage(error),
    cause: error,
  };
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const origin = normalized.cause instanceof Error ? normalized.cause : error;
    if (origin instanceof Error) {
      lines.push({ kind: "name", text: origin.name });
    }

    const nested = origin instanceof Error && "cause" in origin ? origin.cause : undefined;
    if (nested !== undefined && nested !== null) {
      const causeText = formatErrorMessage(nested);
      if (causeText !== normalized.message) {
        lines.push({ kind: "cause", text: causeText });
      }
    }

    if (origin instanceof Error && origin.stack) {
      lines.push({ kind: "stack", text: origin.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    if (message) return message;
    return error.name || DEFAULT_ERROR_MESSAGE;
  }

  if (typeof error === "string") {
    return error.trim() || DEFAULT_ERROR_MESSAGE;
  }

  if (error === null || error === undefined) {
    return DEFAULT_ERROR_MESSAGE;
  }

  return String(error);
}
