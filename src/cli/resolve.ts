import path from "node:path";

import {
  installRequiredFrameworks,
  resolveFrameworks,
  resolveLaunchPlan,
  resolveMainPath,
  resolveStartCommand,
} from "../app/launch-plan.js";
import { ConfigError } from "../core/errors.js";
import { FRAMEWORK_DEPENDENCY } from "../core/paths.js";
import { createManifestCatalog, loadManifest } from "../manifest/manifest.js";
import { findMatchingVersion, findMatchingVersions } from "../resolution/version-resolver.js";

import { loadConfigForCli, loadContextForCli, type GlobalOptions } from "./config.js";

// =============================================================================
// RESOLUTION COMMANDS
// =============================================================================

export function mainPathCommand(opts: GlobalOptions): void {
  const mainPath = resolveMainPath(loadContextForCli(opts));
  if (mainPath !== null) {
    console.log(mainPath);
  }
}

export function frameworksCommand(opts: GlobalOptions): void {
  for (const version of resolveFrameworks(loadContextForCli(opts))) {
    console.log(version);
  }
}

export async function installCommand(opts: GlobalOptions): Promise<void> {
  const summary = await installRequiredFrameworks(loadContextForCli(opts));

  if (summary.installed.length === 0 && summary.skipped.length === 0) {
    console.log("No frameworks required.");
    return;
  }
  if (summary.installed.length > 0) {
    console.log(`Installed: ${summary.installed.join(", ")}`);
  }
  if (summary.skipped.length > 0) {
    console.log(`Already installed: ${summary.skipped.join(", ")}`);
  }
}

export function startCommandCommand(opts: GlobalOptions): void {
  const command = resolveStartCommand(loadContextForCli(opts));
  if (command !== "") {
    console.log(command);
  }
}

export function planCommand(opts: GlobalOptions & { pretty?: boolean }): void {
  const plan = resolveLaunchPlan(loadContextForCli(opts));
  console.log(JSON.stringify(plan, null, opts.pretty ? 2 : undefined));
}

// =============================================================================
// CATALOG COMMANDS
// =============================================================================

export function versionsCommand(
  constraint: string | undefined,
  opts: GlobalOptions & { dependency?: string; all?: boolean },
): void {
  const { config } = loadConfigForCli({ explicitConfigPath: opts.config });
  const manifestPath = opts.manifest ?? config.manifest;
  if (!manifestPath) {
    throw new ConfigError("A manifest is required (set manifest in resolver.yaml or pass --manifest).");
  }

  // Config-file paths arrive absolute; a --manifest flag is relative to the working directory.
  const catalog = createManifestCatalog(loadManifest(path.resolve(manifestPath)));
  const dependency = opts.dependency ?? FRAMEWORK_DEPENDENCY;
  const wanted = constraint ?? catalog.defaultVersion(dependency);
  if (wanted === null) {
    throw new ConfigError(
      `No constraint given and the manifest lists no default version for ${dependency}.`,
    );
  }
  const available = catalog.allVersions(dependency);

  if (opts.all) {
    for (const version of findMatchingVersions(wanted, available)) {
      console.log(version);
    }
    return;
  }
  console.log(findMatchingVersion(wanted, available));
}
