/**
 * Framework installer orchestration.
 * Purpose: make every required Microsoft.NETCore.App version present under the install root.
 * Assumptions: single writer on the install root; the delegated installer owns any retry policy.
 * Usage: await installFrameworks({ versions, installRoot, installer, logger })
 */

import fs from "node:fs";
import path from "node:path";

import { ConfigError, InstallFailureError } from "../core/errors.js";
import { logResolverEvent, type EventLogger } from "../core/logger.js";
import { FRAMEWORK_DEPENDENCY, runtimeInstallDir, sharedFrameworkDir } from "../core/paths.js";

import type { Installer } from "./installer.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstallFrameworksOptions = {
  versions: readonly string[];
  installRoot: string;
  // Only required once a version is missing.
  installer?: Installer;
  logger?: EventLogger;
};

export type InstallSummary = {
  installed: string[];
  skipped: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function installFrameworks(opts: InstallFrameworksOptions): Promise<InstallSummary> {
  const summary: InstallSummary = { installed: [], skipped: [] };

  for (const version of opts.versions) {
    if (isFrameworkInstalled(opts.installRoot, version)) {
      logResolverEvent(opts.logger, "framework.found", {
        version,
        path: frameworkPath(opts.installRoot, version),
      });
      summary.skipped.push(version);
      continue;
    }

    if (!opts.installer) {
      throw new ConfigError(
        `Framework ${version} is not installed and no installer is configured (installer.command).`,
      );
    }

    const destination = runtimeInstallDir(opts.installRoot);
    logResolverEvent(opts.logger, "framework.install.start", { version, destination });
    try {
      await opts.installer.installDependency({ name: FRAMEWORK_DEPENDENCY, version }, destination);
    } catch (err) {
      logResolverEvent(opts.logger, "framework.install.failed", {
        version,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new InstallFailureError(FRAMEWORK_DEPENDENCY, version, err);
    }
    logResolverEvent(opts.logger, "framework.install.complete", { version });
    summary.installed.push(version);
  }

  return summary;
}

export function frameworkPath(installRoot: string, version: string): string {
  return path.join(sharedFrameworkDir(installRoot), version);
}

export function isFrameworkInstalled(installRoot: string, version: string): boolean {
  return fs.existsSync(frameworkPath(installRoot, version));
}
