// Runtime config (*.runtimeconfig.json) reader.
// Purpose: extract the pinned framework and the applyPatches flag from a published tree.

import fs from "node:fs";

import { z } from "zod";

import { RuntimeConfigError } from "../core/errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const FrameworkSchema = z
  .object({
    name: z.string().default(""),
    version: z.string().default(""),
  })
  .passthrough();

const RuntimeConfigSchema = z
  .object({
    runtimeOptions: z
      .object({
        framework: FrameworkSchema.optional(),
        applyPatches: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type RuntimeFramework = {
  name: string;
  version: string;
  applyPatches: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function readRuntimeConfig(configPath: string): RuntimeFramework {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new RuntimeConfigError(configPath, "file is not valid JSON", err);
  }

  const parsed = RuntimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue && issue.path.length > 0 ? issue.path.join(".") : "<root>";
    throw new RuntimeConfigError(configPath, `${location}: ${issue?.message ?? "invalid"}`, parsed.error);
  }

  const options = parsed.data.runtimeOptions;
  return {
    name: options?.framework?.name.trim() ?? "",
    version: options?.framework?.version.trim() ?? "",
    applyPatches: options?.applyPatches ?? true,
  };
}
