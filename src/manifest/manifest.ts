// Buildpack manifest (manifest.yml) and the version catalog derived from it.
// Purpose: answer "which versions of dependency X does this buildpack ship?".
// Assumes the manifest lists one entry per (name, version, stack) and may repeat versions across stacks.

import fs from "node:fs";

import YAML from "yaml";
import { z, type ZodIssue } from "zod";

import { ManifestError } from "../core/errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const ManifestDependencySchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    uri: z.string().optional(),
    sha256: z.string().optional(),
    cf_stacks: z.array(z.string()).default([]),
  })
  .passthrough();

export const DefaultVersionSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
  })
  .strict();

export const ManifestSchema = z
  .object({
    language: z.string().optional(),
    default_versions: z.array(DefaultVersionSchema).default([]),
    dependencies: z.array(ManifestDependencySchema).default([]),
  })
  .passthrough();

export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestDependency = z.infer<typeof ManifestDependencySchema>;

// =============================================================================
// CATALOG
// =============================================================================

export interface CatalogProvider {
  allVersions(name: string): string[];
}

export interface ManifestCatalog extends CatalogProvider {
  defaultVersion(name: string): string | null;
}

export function createManifestCatalog(manifest: Manifest): ManifestCatalog {
  return {
    allVersions: (name) => {
      const seen = new Set<string>();
      for (const dep of manifest.dependencies) {
        if (dep.name === name) seen.add(dep.version);
      }
      return [...seen];
    },
    defaultVersion: (name) =>
      manifest.default_versions.find((entry) => entry.name === name)?.version ?? null,
  };
}

/** A catalog backed by a fixed name -> versions table. */
export function createStaticCatalog(versions: Record<string, readonly string[]>): CatalogProvider {
  return {
    allVersions: (name) => [...(versions[name] ?? [])],
  };
}

// =============================================================================
// LOADING
// =============================================================================

export function loadManifest(manifestPath: string): Manifest {
  let raw: string;
  try {
    raw = fs.readFileSync(manifestPath, "utf8");
  } catch (err) {
    throw new ManifestError(`Unable to read manifest ${manifestPath}`, err);
  }

  return parseManifest(raw, manifestPath);
}

export function parseManifest(raw: string, source = "manifest.yml"): Manifest {
  let doc: unknown;
  try {
    // failsafe keeps every scalar a string, so "2.10" never becomes 2.1.
    doc = YAML.parse(raw, { schema: "failsafe" });
  } catch (err) {
    throw new ManifestError(`Manifest ${source} is not valid YAML`, err);
  }

  const parsed = ManifestSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    throw new ManifestError(
      `Manifest ${source} is invalid: ${formatIssues(parsed.error.issues).join("; ")}`,
      parsed.error,
    );
  }
  return parsed.data;
}

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${location}: ${issue.message}`;
  });
}
