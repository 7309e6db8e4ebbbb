// Build tree layout shared by the locator, requirement detector, installer and launcher.
// Purpose: keep every fixed file name and directory segment in one place.

import path from "node:path";

// =============================================================================
// BUILD ROOT
// =============================================================================

export const PROJECT_FILE_EXTENSIONS = [".csproj", ".vbproj", ".fsproj"] as const;
export const FSHARP_PROJECT_EXTENSION = ".fsproj";

export const RUNTIME_CONFIG_SUFFIX = ".runtimeconfig.json";
export const LIBRARY_SUFFIX = ".dll";

export const DEPLOYMENT_HINT_FILE = ".deployment";
export const DEPLOYMENT_HINT_SECTION = "config";
export const DEPLOYMENT_HINT_KEY = "project";

// Reserved for buildpack bookkeeping; never application source.
export const RESERVED_DIR = ".cloudfoundry";

// =============================================================================
// DEPENDENCY STAGING
// =============================================================================

export const PUBLISH_DIR = "dotnet_publish";
export const CORE_FRAMEWORK_PACKAGE = "microsoft.netcore.app";
export const FRAMEWORK_DEPENDENCY = "dotnet-framework";

export const HOME_TOKEN = "${HOME}";
export const DEPS_DIR_TOKEN = "${DEPS_DIR}";

export function publishDir(depDir: string): string {
  return path.join(depDir, PUBLISH_DIR);
}

export function publishRuntimeRoot(depsIdx: string): string {
  return path.join(DEPS_DIR_TOKEN, depsIdx, PUBLISH_DIR);
}

export function restoredFrameworksDir(depDir: string): string {
  return path.join(depDir, ".nuget", "packages", CORE_FRAMEWORK_PACKAGE);
}

// =============================================================================
// INSTALL ROOT
// =============================================================================

export const PLATFORM_RUNTIME_DIR = "dotnet";
export const SHARED_FRAMEWORK_NAME = "Microsoft.NETCore.App";

export function runtimeInstallDir(installRoot: string): string {
  return path.join(installRoot, PLATFORM_RUNTIME_DIR);
}

export function sharedFrameworkDir(installRoot: string): string {
  return path.join(runtimeInstallDir(installRoot), "shared", SHARED_FRAMEWORK_NAME);
}
