import fs from "node:fs";
import path from "node:path";

import ini from "ini";

import { DeploymentHintError } from "../core/errors.js";
import {
  DEPLOYMENT_HINT_FILE,
  DEPLOYMENT_HINT_KEY,
  DEPLOYMENT_HINT_SECTION,
} from "../core/paths.js";

export type DeploymentHint = {
  hintPath: string;
  // Project path exactly as written under [config], or null when the key is missing.
  project: string | null;
};

export function deploymentHintPath(buildDir: string): string {
  return path.join(buildDir, DEPLOYMENT_HINT_FILE);
}

/** Returns null when the build root carries no .deployment file. */
export function readDeploymentHint(buildDir: string): DeploymentHint | null {
  const hintPath = deploymentHintPath(buildDir);
  if (!fs.existsSync(hintPath)) {
    return null;
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = ini.parse(fs.readFileSync(hintPath, "utf8"));
  } catch (err) {
    throw new DeploymentHintError(hintPath, err);
  }

  const section = parsed[DEPLOYMENT_HINT_SECTION];
  if (!isRecord(section)) {
    return { hintPath, project: null };
  }

  const project = section[DEPLOYMENT_HINT_KEY];
  if (typeof project !== "string" || project.trim().length === 0) {
    return { hintPath, project: null };
  }
  return { hintPath, project: project.trim() };
}

/** "./a/b/web.vbproj" -> "<buildDir>/a/b/web.vbproj" */
export function resolveHintedProject(buildDir: string, project: string): string {
  return path.join(buildDir, project.replace(/^\.+|\.+$/g, ""));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
