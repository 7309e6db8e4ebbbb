/**
 * Resolver context.
 * Purpose: turn config + CLI overrides into the collaborators one resolution run needs.
 * Assumptions: deps_dir is the shared deps root; this buildpack stages under <deps_dir>/<deps_idx>.
 * Usage: buildResolverContext({ config, overrides, logger }) and pass the result to launch-plan helpers.
 */

import path from "node:path";

import type { ResolverConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { combineLoggers, JsonlLogger, type EventLogger } from "../core/logger.js";
import { createCommandInstaller } from "../install/command-installer.js";
import type { Installer } from "../install/installer.js";
import {
  createManifestCatalog,
  createStaticCatalog,
  loadManifest,
  type CatalogProvider,
} from "../manifest/manifest.js";
import { Project } from "../resolution/project-locator.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolverOverrides = {
  buildDir?: string;
  depsDir?: string;
  depsIdx?: string;
  manifest?: string;
};

export type ResolverContext = {
  project: Project;
  installRoot: string;
  verifyPinnedVersions: boolean;
  logger: EventLogger;
  loadCatalog: () => CatalogProvider;
  // Absent when resolver.yaml configures no installer command.
  installer?: Installer;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildResolverContext(args: {
  config: ResolverConfig;
  overrides?: ResolverOverrides;
  logger?: EventLogger;
  cwd?: string;
}): ResolverContext {
  const { config } = args;
  const overrides = args.overrides ?? {};
  const cwd = args.cwd ?? process.cwd();

  const buildDir = path.resolve(cwd, overrides.buildDir ?? config.build_dir ?? ".");
  const depsDir = overrides.depsDir ?? config.deps_dir;
  if (!depsDir) {
    throw new ConfigError("deps_dir is required (set it in resolver.yaml or pass --deps-dir).");
  }
  const depsIdx = overrides.depsIdx ?? config.deps_idx;
  const depDir = path.resolve(cwd, depsDir, depsIdx);

  const manifestPath = overrides.manifest ?? config.manifest;
  const fileLogger = config.log_file ? new JsonlLogger(config.log_file, { deps_idx: depsIdx }) : undefined;

  return {
    project: new Project({ buildDir, depDir, depsIdx }),
    installRoot: config.install_root ? path.resolve(cwd, config.install_root) : depDir,
    verifyPinnedVersions: config.verify_pinned_versions,
    logger: combineLoggers(args.logger, fileLogger),
    loadCatalog: () =>
      manifestPath
        ? createManifestCatalog(loadManifest(path.resolve(cwd, manifestPath)))
        : createStaticCatalog({}),
    installer: config.installer
      ? createCommandInstaller({
          command: config.installer.command,
          cwd: buildDir,
          env: config.installer.env,
        })
      : undefined,
  };
}
