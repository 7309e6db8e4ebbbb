/**
 * Build tree test helpers.
 * Purpose: create throwaway build roots and deps dirs under the OS temp dir.
 * Usage: const root = makeTempDir("locator-"); writeTree(root, { "app.csproj": "" });
 * Call cleanupTempDirs() from afterEach.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

const tempDirs: string[] = [];

export function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export function writeTree(root: string, files: Record<string, string>, mode = 0o644): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fse.outputFileSync(target, content);
    fs.chmodSync(target, mode);
  }
}

export function makeDirs(root: string, dirs: string[]): void {
  for (const dir of dirs) {
    fse.ensureDirSync(path.join(root, dir));
  }
}

export type BuildLayout = {
  buildDir: string;
  depsDir: string;
  depsIdx: string;
  depDir: string;
};

export function makeBuildLayout(depsIdx = "9"): BuildLayout {
  const buildDir = makeTempDir("dotnet-launch.build.");
  const depsDir = makeTempDir("dotnet-launch.deps.");
  const depDir = path.join(depsDir, depsIdx);
  fse.ensureDirSync(depDir);
  return { buildDir, depsDir, depsIdx, depDir };
}
