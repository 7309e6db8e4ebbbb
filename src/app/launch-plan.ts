import { logResolverEvent } from "../core/logger.js";
import { installFrameworks, type InstallSummary } from "../install/framework-installer.js";
import type { Installer } from "../install/installer.js";
import { startCommand } from "../launch/start-command.js";
import { requiredFrameworkVersions } from "../resolution/framework-requirements.js";

import type { ResolverContext } from "./resolver-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchPlan = {
  mainPath: string | null;
  published: boolean;
  fsharp: boolean;
  frameworks: string[];
  startCommand: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveMainPath(ctx: ResolverContext): string | null {
  const mainPath = ctx.project.mainPath();
  logResolverEvent(ctx.logger, "project.main_path", { path: mainPath });
  return mainPath;
}

export function resolveFrameworks(ctx: ResolverContext): string[] {
  return requiredFrameworkVersions({
    project: ctx.project,
    catalog: ctx.loadCatalog(),
    verifyPinnedVersions: ctx.verifyPinnedVersions,
    logger: ctx.logger,
  });
}

export async function installRequiredFrameworks(
  ctx: ResolverContext,
  installer?: Installer,
): Promise<InstallSummary> {
  const versions = resolveFrameworks(ctx);
  if (versions.length === 0) {
    return { installed: [], skipped: [] };
  }

  return installFrameworks({
    versions,
    installRoot: ctx.installRoot,
    installer: installer ?? ctx.installer,
    logger: ctx.logger,
  });
}

export function resolveStartCommand(ctx: ResolverContext): string {
  return startCommand(ctx.project, { logger: ctx.logger });
}

export function resolveLaunchPlan(ctx: ResolverContext): LaunchPlan {
  const mainPath = resolveMainPath(ctx);
  return {
    mainPath,
    published: ctx.project.isPublished(),
    fsharp: ctx.project.isFsharp(),
    frameworks: resolveFrameworks(ctx),
    startCommand: mainPath === null ? "" : resolveStartCommand(ctx),
  };
}
