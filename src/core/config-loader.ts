/*
Purpose: load resolver.yaml into a validated ResolverConfig.
Assumptions: relative paths in the file are relative to the file's directory.
Usage: loadResolverConfig("/workspace/resolver.yaml").
*/

import fs from "node:fs";
import path from "node:path";

import YAML from "yaml";

import { ResolverConfigSchema, type ResolverConfig } from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

const CONFIG_HINT = "Check resolver.yaml against the documented keys or pass --config.";
const PATH_KEYS = ["build_dir", "deps_dir", "manifest", "install_root", "log_file"] as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadResolverConfig(configPath: string): ResolverConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Resolver config missing.",
      message: `No config file at ${resolvedPath}.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Config file not found: ${resolvedPath}`),
    });
  }

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(resolvedPath, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Resolver config unreadable.",
      message: `Config file ${resolvedPath} is not valid YAML.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Invalid YAML in ${resolvedPath}`, err),
    });
  }

  const parsed = ResolverConfigSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${location}: ${issue.message}`;
    });
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Resolver config invalid.",
      message: `Config file ${resolvedPath} failed validation: ${details.join("; ")}`,
      hint: CONFIG_HINT,
      cause: new ConfigError(details.join("\n"), parsed.error),
    });
  }

  return resolveRelativePaths(parsed.data, path.dirname(resolvedPath));
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveRelativePaths(config: ResolverConfig, baseDir: string): ResolverConfig {
  const resolved: ResolverConfig = { ...config };
  for (const key of PATH_KEYS) {
    const value = resolved[key];
    if (value !== undefined) {
      resolved[key] = path.resolve(baseDir, value);
    }
  }
  return resolved;
}
