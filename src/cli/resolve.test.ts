import path from "node:path";

import { execa } from "execa";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  cleanupTempDirs,
  makeBuildLayout,
  makeTempDir,
  writeTree,
  type BuildLayout,
} from "../__tests__/build-tree.helpers.js";
import { main } from "../index.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

const MANIFEST = `default_versions:
- name: dotnet-framework
  version: 2.1.x
dependencies:
- name: dotnet-framework
  version: 2.1.2
- name: dotnet-framework
  version: 2.1.6
- name: dotnet-framework
  version: 2.2.0
`;

let layout: BuildLayout;
let configPath: string;
let manifestPath: string;
let stdout: string[];
let stderr: string[];

beforeEach(() => {
  layout = makeBuildLayout("2");
  const configDir = makeTempDir("cli-config-");
  manifestPath = path.join(configDir, "manifest.yml");
  configPath = path.join(configDir, "resolver.yaml");
  writeTree(configDir, {
    "manifest.yml": MANIFEST,
    "resolver.yaml": [
      `build_dir: ${layout.buildDir}`,
      `deps_dir: ${layout.depsDir}`,
      "deps_idx: 2",
      "manifest: ./manifest.yml",
      "installer:",
      "  command: [fetch-dep, \"{name}\", \"{version}\", \"{destination}\"]",
      "  env:",
      "    FETCH_CACHE: /tmp/fetch-cache",
      "",
    ].join("\n"),
  });

  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((line: unknown) => {
    stdout.push(String(line));
  });
  vi.spyOn(console, "error").mockImplementation((line: unknown) => {
    stderr.push(String(line));
  });
});

afterEach(() => {
  cleanupTempDirs();
  vi.restoreAllMocks();
  execaMock.mockReset();
  process.exitCode = undefined;
});

async function run(...args: string[]): Promise<void> {
  await main(["node", "dotnet-launch", "--quiet", "--config", configPath, ...args]);
}

// =============================================================================
// TESTS
// =============================================================================

describe("dotnet-launch", () => {
  it("prints the launch plan as JSON", async () => {
    writeTree(layout.buildDir, {
      "web.runtimeconfig.json": JSON.stringify({
        runtimeOptions: { framework: { name: "Microsoft.NETCore.App", version: "2.1.0" } },
      }),
      "web.dll": "",
    });

    await run("plan");

    expect(stdout).toHaveLength(1);
    expect(JSON.parse(stdout[0] ?? "")).toEqual({
      mainPath: path.join(layout.buildDir, "web.runtimeconfig.json"),
      published: true,
      fsharp: false,
      frameworks: ["2.1.6"],
      startCommand: "${HOME}/web.dll",
    });
    expect(process.exitCode).toBeUndefined();
  });

  it("prints the start command", async () => {
    writeTree(layout.buildDir, { "app/app.csproj": "<Project></Project>" });
    writeTree(path.join(layout.depDir, "dotnet_publish"), { "app.dll": "" });

    await run("start-command");

    expect(stdout).toEqual(["${DEPS_DIR}/2/dotnet_publish/app.dll"]);
  });

  it("lets flags override the config file", async () => {
    const other = makeBuildLayout("7");
    writeTree(other.buildDir, { "solo.vbproj": "<Project></Project>" });

    await run("--build-dir", other.buildDir, "main-path");

    expect(stdout).toEqual([path.join(other.buildDir, "solo.vbproj")]);
  });

  it("resolves constraints against the manifest", async () => {
    await run("versions", "2.1.x", "--all");
    await run("--manifest", manifestPath, "versions", "2.x.x");

    expect(stdout).toEqual(["2.1.6", "2.1.2", "2.2.0"]);
  });

  it("falls back to the manifest's default version line", async () => {
    await run("versions");
    await run("versions", "--dependency", "dotnet-sdk");

    expect(stdout).toEqual(["2.1.6"]);
    expect(stderr[0]).toBe("Error: Config invalid.");
    expect(stderr[1]).toBe(
      "No constraint given and the manifest lists no default version for dotnet-sdk.",
    );
    expect(process.exitCode).toBe(1);
  });

  it("installs missing frameworks through the configured command", async () => {
    writeTree(layout.buildDir, {
      "web.runtimeconfig.json": JSON.stringify({
        runtimeOptions: { framework: { name: "Microsoft.NETCore.App", version: "2.2.0" } },
      }),
    });
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "",
      exitCode: 0,
    } as Awaited<ReturnType<typeof execa>>);

    await run("install");

    const destination = path.join(layout.depDir, "dotnet");
    expect(execaMock).toHaveBeenCalledWith(
      "fetch-dep",
      ["dotnet-framework", "2.2.0", destination],
      { cwd: layout.buildDir, env: { FETCH_CACHE: "/tmp/fetch-cache" } },
    );
    expect(stdout).toEqual(["Installed: 2.2.0"]);
  });

  it("reports ambiguous projects with a remedy and a failing exit code", async () => {
    writeTree(layout.buildDir, {
      "api/api.csproj": "<Project></Project>",
      "tests/tests.csproj": "<Project></Project>",
    });

    await run("main-path");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "Error: Multiple project files found.",
      `Multiple paths: [${path.join(layout.buildDir, "api/api.csproj")}, ${path.join(
        layout.buildDir,
        "tests/tests.csproj",
      )}] contain a project file, but no .deployment file was used`,
      "Add a .deployment file with a [config] section naming the project to run.",
      "[config]\nproject = ./path/to/app.csproj",
    ]);
    expect(process.exitCode).toBe(1);
  });
});
