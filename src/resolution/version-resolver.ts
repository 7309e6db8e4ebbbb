// Version constraint solving against a catalog of available versions.
// Purpose: pick the highest catalog entry matching a dotted constraint such as "2.1.x".
// Assumes versions are dot-separated; segments compare numerically, never as floats.

import { NoMatchingVersionError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type VersionSegment =
  | { kind: "number"; value: number; suffix: string; raw: string }
  | { kind: "text"; raw: string };

export type ParsedVersion = {
  raw: string;
  segments: VersionSegment[];
};

const WILDCARDS = new Set(["x", "X", "*"]);
const NUMERIC_SEGMENT = /^(\d+)(.*)$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function findMatchingVersion(constraint: string, catalog: readonly string[]): string {
  const [best] = findMatchingVersions(constraint, catalog);
  if (best === undefined) {
    throw new NoMatchingVersionError(constraint, catalog.length);
  }
  return best;
}

export function findMatchingVersions(constraint: string, catalog: readonly string[]): string[] {
  const wanted = constraint.trim().split(".");

  return catalog
    .map(parseVersion)
    .filter((candidate) => satisfies(candidate, wanted))
    .sort((left, right) => compareParsed(right, left))
    .map((candidate) => candidate.raw);
}

export function isWildcardSegment(segment: string): boolean {
  return WILDCARDS.has(segment);
}

export function compareVersions(left: string, right: string): number {
  return compareParsed(parseVersion(left), parseVersion(right));
}

export function parseVersion(version: string): ParsedVersion {
  const raw = version.trim();
  return { raw, segments: raw.split(".").map(parseSegment) };
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseSegment(raw: string): VersionSegment {
  const match = NUMERIC_SEGMENT.exec(raw);
  if (!match) {
    return { kind: "text", raw };
  }
  return { kind: "number", value: Number(match[1]), suffix: match[2] ?? "", raw };
}

function satisfies(candidate: ParsedVersion, wanted: string[]): boolean {
  if (candidate.segments.length !== wanted.length) {
    return false;
  }

  return wanted.every((expected, index) => {
    const segment = candidate.segments[index];
    if (segment === undefined) return false;
    if (isWildcardSegment(expected)) {
      // Wildcards only select release segments.
      return segment.kind === "number" && segment.suffix === "";
    }
    return segment.raw === expected;
  });
}

function compareParsed(left: ParsedVersion, right: ParsedVersion): number {
  const length = Math.max(left.segments.length, right.segments.length);
  for (let index = 0; index < length; index += 1) {
    const a = left.segments[index];
    const b = right.segments[index];
    if (a === undefined || b === undefined) {
      if (a === b) continue;
      return a === undefined ? -1 : 1;
    }

    const diff = compareSegments(a, b);
    if (diff !== 0) return diff;
  }
  return 0;
}

function compareSegments(a: VersionSegment, b: VersionSegment): number {
  if (a.kind === "number" && b.kind === "number") {
    if (a.value !== b.value) return a.value < b.value ? -1 : 1;
    if (a.suffix === b.suffix) return 0;
    // "0" outranks "0-preview1".
    if (a.suffix === "") return 1;
    if (b.suffix === "") return -1;
    return compareText(a.suffix, b.suffix);
  }

  if (a.kind === "number") return 1;
  if (b.kind === "number") return -1;
  return compareText(a.raw, b.raw);
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
