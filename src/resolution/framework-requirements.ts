/**
 * Framework requirement detection.
 * Purpose: list the Microsoft.NETCore.App versions a build tree needs.
 * Assumptions: a published tree pins its framework in the runtime config; an unpublished one
 * restored its framework packages under <depDir>/.nuget/packages/microsoft.netcore.app.
 * Usage: requiredFrameworkVersions({ project, catalog }) -> ["2.1.6"]
 */

import fs from "node:fs";

import type { EventLogger } from "../core/logger.js";
import { logResolverEvent } from "../core/logger.js";
import { FRAMEWORK_DEPENDENCY, restoredFrameworksDir } from "../core/paths.js";
import type { CatalogProvider } from "../manifest/manifest.js";

import type { Project } from "./project-locator.js";
import { readRuntimeConfig } from "./runtime-config.js";
import { findMatchingVersion } from "./version-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type RequirementOptions = {
  project: Project;
  catalog: CatalogProvider;
  // Check pinned (applyPatches: false) versions against the catalog as well.
  verifyPinnedVersions?: boolean;
  logger?: EventLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function requiredFrameworkVersions(opts: RequirementOptions): string[] {
  const runtimeConfig = opts.project.runtimeConfigFile();
  const versions =
    runtimeConfig !== null
      ? publishedRequirement(runtimeConfig, opts)
      : restoredVersions(opts.project.depDir);

  if (versions.length > 0) {
    logResolverEvent(opts.logger, "frameworks.required", {
      versions,
      source: runtimeConfig !== null ? "runtimeconfig" : "restore",
    });
  }
  return versions;
}

/** "2.1.3" -> "2.1.x"; fewer than three segments are padded with wildcards. */
export function patchConstraint(version: string): string {
  const segments = version.split(".");
  while (segments.length < 3) {
    segments.push("x");
  }
  segments[2] = "x";
  return segments.join(".");
}

// =============================================================================
// INTERNALS
// =============================================================================

function publishedRequirement(configPath: string, opts: RequirementOptions): string[] {
  const framework = readRuntimeConfig(configPath);
  if (framework.version === "") {
    return [];
  }

  if (!framework.applyPatches && !opts.verifyPinnedVersions) {
    return [framework.version];
  }

  const constraint = framework.applyPatches ? patchConstraint(framework.version) : framework.version;
  return [findMatchingVersion(constraint, opts.catalog.allVersions(FRAMEWORK_DEPENDENCY))];
}

function restoredVersions(depDir: string): string[] {
  const restoredDir = restoredFrameworksDir(depDir);
  if (!fs.existsSync(restoredDir)) {
    return [];
  }

  return fs
    .readdirSync(restoredDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}
