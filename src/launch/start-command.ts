/**
 * Start command synthesis.
 * Purpose: turn the main path into the path the launcher runs, e.g. "${HOME}/web" or
 * "${DEPS_DIR}/0/dotnet_publish/web.dll".
 * Assumptions: published trees run from the build root; unpublished ones from <depDir>/dotnet_publish.
 * Usage: startCommand(project, { logger }) -> "" when nothing runnable exists yet.
 */

import fs from "node:fs";
import path from "node:path";

import { logResolverEvent, type EventLogger } from "../core/logger.js";
import {
  HOME_TOKEN,
  LIBRARY_SUFFIX,
  RUNTIME_CONFIG_SUFFIX,
  publishDir,
  publishRuntimeRoot,
} from "../core/paths.js";
import { readAssemblyName } from "../resolution/descriptor.js";
import type { Project } from "../resolution/project-locator.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartCommandOptions = {
  logger?: EventLogger;
};

export type PublishLocation = {
  // Where the built artifact lives on disk during staging.
  searchDir: string;
  // The same directory as the launcher sees it at runtime.
  runtimeRoot: string;
};

const EXECUTABLE_MODE = 0o755;
const PROJECT_SUFFIX = /\.[a-z]+proj$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function startCommand(project: Project, opts: StartCommandOptions = {}): string {
  const mainPath = project.mainPath();
  if (mainPath === null) {
    return "";
  }

  const baseName = artifactBaseName(mainPath);
  const location = publishLocation(project);
  const command = runnableArtifact(baseName, location, opts.logger);

  logResolverEvent(opts.logger, "start_command.resolved", {
    main_path: mainPath,
    base_name: baseName,
    command,
  });
  return command;
}

export function artifactBaseName(mainPath: string): string {
  const fileName = path.basename(mainPath);
  if (fileName.endsWith(RUNTIME_CONFIG_SUFFIX)) {
    return fileName.slice(0, -RUNTIME_CONFIG_SUFFIX.length);
  }

  const assemblyName = readAssemblyName(mainPath);
  if (assemblyName !== null) {
    return assemblyName.replace(PROJECT_SUFFIX, "");
  }
  return fileName.replace(PROJECT_SUFFIX, "");
}

export function publishLocation(project: Project): PublishLocation {
  if (project.isPublished()) {
    return { searchDir: project.buildDir, runtimeRoot: HOME_TOKEN };
  }
  return {
    searchDir: publishDir(project.depDir),
    runtimeRoot: publishRuntimeRoot(project.depsIdx),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function runnableArtifact(
  baseName: string,
  location: PublishLocation,
  logger: EventLogger | undefined,
): string {
  const executable = path.join(location.searchDir, baseName);
  if (isFile(executable)) {
    // Archives and restores can drop the execute bit.
    fs.chmodSync(executable, EXECUTABLE_MODE);
    logResolverEvent(logger, "start_command.chmod", { path: executable });
    return path.join(location.runtimeRoot, baseName);
  }

  const libraryName = `${baseName}${LIBRARY_SUFFIX}`;
  if (isFile(path.join(location.searchDir, libraryName))) {
    return path.join(location.runtimeRoot, libraryName);
  }

  return "";
}

function isFile(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch (err) {
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}
