import { describe, expect, it } from "vitest";

import { NoMatchingVersionError } from "../core/errors.js";

import { compareVersions, findMatchingVersion, findMatchingVersions } from "./version-resolver.js";

const CATALOG = ["1.0.4", "1.0.10", "2.0.0", "1.0.9", "1.1.2", "1.0.11-preview1"];

describe("findMatchingVersion", () => {
  it("picks the highest patch for a wildcarded patch segment", () => {
    expect(findMatchingVersion("1.0.x", CATALOG)).toBe("1.0.10");
  });

  it("orders multi-digit segments numerically", () => {
    expect(findMatchingVersion("1.0.x", ["1.0.9", "1.0.10"])).toBe("1.0.10");
    expect(findMatchingVersion("x.0.0", ["9.0.0", "10.0.0"])).toBe("10.0.0");
  });

  it("accepts * as a wildcard marker", () => {
    expect(findMatchingVersion("1.0.*", CATALOG)).toBe("1.0.10");
  });

  it("never selects a pre-release through a wildcard", () => {
    expect(findMatchingVersion("1.0.x", ["1.0.1", "1.0.11-preview1"])).toBe("1.0.1");
  });

  it("matches literal constraints exactly", () => {
    expect(findMatchingVersion("1.0.11-preview1", CATALOG)).toBe("1.0.11-preview1");
    expect(findMatchingVersion("2.0.0", CATALOG)).toBe("2.0.0");
  });

  it("fails with the constraint and catalog size when nothing matches", () => {
    let error: unknown;
    try {
      findMatchingVersion("3.0.x", CATALOG);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(NoMatchingVersionError);
    const noMatch = error as NoMatchingVersionError;
    expect(noMatch.constraint).toBe("3.0.x");
    expect(noMatch.catalogSize).toBe(6);
    expect(noMatch.message).toBe("No match found for 3.0.x among 6 available version(s)");
  });

  it("requires the candidate to have as many segments as the constraint", () => {
    expect(() => findMatchingVersion("1.0", CATALOG)).toThrow(NoMatchingVersionError);
  });

  it("fails on an empty catalog", () => {
    expect(() => findMatchingVersion("1.0.x", [])).toThrow(NoMatchingVersionError);
  });
});

describe("findMatchingVersions", () => {
  it("returns every match, highest first", () => {
    expect(findMatchingVersions("1.x.x", CATALOG)).toEqual(["1.1.2", "1.0.10", "1.0.9", "1.0.4"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(findMatchingVersions("4.x.x", CATALOG)).toEqual([]);
  });
});

describe("compareVersions", () => {
  it("compares segment by segment", () => {
    expect(compareVersions("10.0.0", "9.9.9")).toBe(1);
    expect(compareVersions("1.2.3", "1.2.3")).toBe(0);
    expect(compareVersions("1.0", "1.0.0")).toBe(-1);
  });

  it("ranks a release above its pre-releases", () => {
    expect(compareVersions("2.1.0-preview1", "2.1.0")).toBe(-1);
    expect(compareVersions("2.1.0-preview2", "2.1.0-preview1")).toBe(1);
  });
});
