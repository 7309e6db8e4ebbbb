/**
 * Build descriptor metadata.
 * Purpose: read the AssemblyName override from a .csproj/.vbproj/.fsproj file.
 * Assumptions: only <PropertyGroup><AssemblyName> matters; everything else is ignored.
 * Usage: readAssemblyName("/app/src/web.csproj") -> "web.api" | null
 */

import fs from "node:fs";

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";

import { MalformedDescriptorError } from "../core/errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const TextValueSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const PropertyGroupSchema = z
  .object({
    AssemblyName: z.union([TextValueSchema, z.array(TextValueSchema)]).optional(),
  })
  .passthrough();

const ProjectElementSchema = z
  .object({
    PropertyGroup: z.array(z.union([PropertyGroupSchema, z.string()])).default([]),
  })
  .passthrough();

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  isArray: (name) => name === "PropertyGroup",
});

// =============================================================================
// PUBLIC API
// =============================================================================

export function readAssemblyName(descriptorPath: string): string | null {
  let content: string;
  try {
    content = fs.readFileSync(descriptorPath, "utf8");
  } catch (err) {
    throw new MalformedDescriptorError(descriptorPath, "file could not be read", err);
  }

  return parseAssemblyName(descriptorPath, content);
}

export function parseAssemblyName(descriptorPath: string, content: string): string | null {
  if (content.trim().length === 0) {
    throw new MalformedDescriptorError(descriptorPath, "file is empty");
  }

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedDescriptorError(descriptorPath, `${msg} (line ${line})`);
  }

  const document: unknown = parser.parse(content);
  const root = firstElement(document);
  if (root === null) {
    return null;
  }

  const parsed = ProjectElementSchema.safeParse(root);
  if (!parsed.success) {
    throw new MalformedDescriptorError(descriptorPath, "unexpected PropertyGroup shape", parsed.error);
  }

  // Later property groups override earlier ones.
  let assemblyName: string | null = null;
  for (const group of parsed.data.PropertyGroup) {
    if (typeof group === "string" || group.AssemblyName === undefined) continue;
    const values = Array.isArray(group.AssemblyName) ? group.AssemblyName : [group.AssemblyName];
    for (const value of values) {
      if (value.length > 0) assemblyName = value;
    }
  }
  return assemblyName;
}

// =============================================================================
// INTERNALS
// =============================================================================

function firstElement(document: unknown): Record<string, unknown> | null {
  if (!isRecord(document)) return null;

  for (const value of Object.values(document)) {
    if (isRecord(value)) return value;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
