import { describe, expect, it } from "vitest";

import { formatErrorLines, formatErrorMessage, toUserFacingError } from "./error-format.js";
import {
  AmbiguousProjectError,
  DeploymentHintError,
  InstallFailureError,
  NoMatchingVersionError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "Missing deps_dir",
      hint: "Pass --deps-dir",
      next: "dotnet-launch plan --deps-dir /tmp/deps",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Config error");
    expect(lines[1]?.text).toBe("Missing deps_dir");
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.install,
      title: "Install failed",
      message: "Installer stopped",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.some((line) => line.kind === "code" && line.text === "INSTALL_ERROR")).toBe(true);
    expect(lines.some((line) => line.kind === "name" && line.text === "Error")).toBe(true);
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("boom");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });

  it("suggests a deployment hint for ambiguous projects", () => {
    const lines = formatErrorLines(new AmbiguousProjectError(["/app/a.csproj", "/app/b.csproj"]));

    expect(lines).toEqual([
      { kind: "title", text: "Multiple project files found." },
      {
        kind: "message",
        text: "Multiple paths: [/app/a.csproj, /app/b.csproj] contain a project file, but no .deployment file was used",
      },
      {
        kind: "hint",
        text: "Add a .deployment file with a [config] section naming the project to run.",
      },
      { kind: "next", text: "[config]\nproject = ./path/to/app.csproj" },
    ]);
  });
});

describe("toUserFacingError", () => {
  it("passes user-facing errors through", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "Missing deps_dir",
    });

    expect(toUserFacingError(error)).toBe(error);
  });

  it("maps unreadable deployment hints to a project error", () => {
    const cause = new Error("EISDIR: illegal operation on a directory, read");
    const mapped = toUserFacingError(new DeploymentHintError("/app/.deployment", cause));

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.project);
    expect(mapped.title).toBe("Deployment hint unreadable.");
    expect(mapped.message).toBe("Unable to read deployment hint /app/.deployment");
    expect(mapped.hint).toBe("Check that .deployment is a valid INI file.");
  });

  it("maps version errors", () => {
    const mapped = toUserFacingError(new NoMatchingVersionError("2.2.x", 3));

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.version);
    expect(mapped.message).toBe("No match found for 2.2.x among 3 available version(s)");
  });

  it("keeps the installer's error as the cause of install failures", () => {
    const cause = new Error("download failed: 404");
    const mapped = toUserFacingError(new InstallFailureError("dotnet-framework", "2.0.5", cause));

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.install);
    expect(mapped.title).toBe("Installing dotnet-framework 2.0.5 failed.");
    expect(mapped.message).toBe("download failed: 404");
    expect(mapped.cause).toBe(cause);
  });
});

describe("formatErrorMessage", () => {
  it("falls back for empty values", () => {
    expect(formatErrorMessage(undefined)).toBe("An unexpected error occurred.");
    expect(formatErrorMessage("  ")).toBe("An unexpected error occurred.");
    expect(formatErrorMessage(new Error(" trimmed "))).toBe("trimmed");
  });
});
