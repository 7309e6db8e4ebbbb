/**
 * Project locator.
 * Purpose: find the build descriptors and runtime config in a build root and settle on one main path.
 * Assumptions: the build root is a local, fully materialized tree; nothing else writes to it meanwhile.
 * Usage: new Project({ buildDir, depDir, depsIdx }).mainPath()
 */

import fs from "node:fs";
import path from "node:path";

import { AmbiguousProjectError, AmbiguousRuntimeConfigError } from "../core/errors.js";
import {
  FSHARP_PROJECT_EXTENSION,
  PROJECT_FILE_EXTENSIONS,
  RESERVED_DIR,
  RUNTIME_CONFIG_SUFFIX,
} from "../core/paths.js";

import { readDeploymentHint, resolveHintedProject } from "./deployment-hint.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProjectLayout = {
  buildDir: string;
  // Dependency staging dir for this buildpack: <depsDir>/<depsIdx>.
  depDir: string;
  depsIdx: string;
};

// =============================================================================
// PROJECT
// =============================================================================

export class Project {
  readonly buildDir: string;
  readonly depDir: string;
  readonly depsIdx: string;

  constructor(layout: ProjectLayout) {
    this.buildDir = layout.buildDir;
    this.depDir = layout.depDir;
    this.depsIdx = layout.depsIdx;
  }

  projectFiles(): string[] {
    return walkProjectFiles(this.buildDir);
  }

  runtimeConfigFile(): string | null {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.buildDir, { withFileTypes: true });
    } catch (err) {
      if (isMissingPath(err)) return null;
      throw err;
    }

    const matches = entries
      .filter((entry) => !entry.isDirectory() && entry.name.endsWith(RUNTIME_CONFIG_SUFFIX))
      .map((entry) => path.join(this.buildDir, entry.name))
      .sort();

    if (matches.length > 1) {
      throw new AmbiguousRuntimeConfigError(matches);
    }
    return matches[0] ?? null;
  }

  isPublished(): boolean {
    return this.runtimeConfigFile() !== null;
  }

  isFsharp(): boolean {
    return this.projectFiles().some((file) => file.endsWith(FSHARP_PROJECT_EXTENSION));
  }

  /**
   * The single artifact the rest of resolution keys off: the runtime config when the
   * tree is published, otherwise the one project file (or the one named by .deployment).
   * Returns null when the tree holds neither.
   */
  mainPath(): string | null {
    const runtimeConfig = this.runtimeConfigFile();
    if (runtimeConfig !== null) {
      return runtimeConfig;
    }

    const candidates = this.projectFiles();
    if (candidates.length === 0) return null;
    if (candidates.length === 1) return candidates[0] ?? null;

    const hint = readDeploymentHint(this.buildDir);
    if (hint === null) {
      throw new AmbiguousProjectError(candidates);
    }
    if (hint.project === null) {
      throw new AmbiguousProjectError(candidates, hint.hintPath);
    }
    return resolveHintedProject(this.buildDir, hint.project);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function walkProjectFiles(root: string): string[] {
  const found: string[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root && isMissingPath(err)) return [];
      // Unreadable subtrees are skipped; the rest of the tree is still scanned.
      if (dir !== root && isPermissionDenied(err)) continue;
      throw err;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== RESERVED_DIR) pending.push(fullPath);
        continue;
      }
      if (isProjectFile(entry.name)) {
        found.push(fullPath);
      }
    }
  }

  return found.sort();
}

function isProjectFile(name: string): boolean {
  return PROJECT_FILE_EXTENSIONS.some((extension) => name.endsWith(extension));
}

function isMissingPath(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

function isPermissionDenied(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}
