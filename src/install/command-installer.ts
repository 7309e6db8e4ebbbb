// Installer backed by an external command.
// Purpose: hand each install to a configured program (e.g. the buildpack's dependency fetcher).
// Assumes the command exits non-zero on failure and writes its diagnostics to stderr.

import { execa } from "execa";
import fse from "fs-extra";

import type { Dependency, Installer } from "./installer.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandInstallerOptions = {
  // argv; "{name}", "{version}" and "{destination}" are substituted per install.
  command: string[];
  cwd?: string;
  env?: Record<string, string>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCommandInstaller(options: CommandInstallerOptions): Installer {
  const [program, ...templateArgs] = options.command;
  if (program === undefined || program.trim().length === 0) {
    throw new Error("Installer command must name a program.");
  }

  return {
    async installDependency(dependency: Dependency, destination: string): Promise<void> {
      await fse.ensureDir(destination);

      const values = { ...dependency, destination };
      const args = templateArgs.map((arg) => expandPlaceholders(arg, values));

      try {
        await execa(program, args, {
          cwd: options.cwd,
          env: options.env,
        });
      } catch (err) {
        throw new Error(
          `Installer command failed for ${dependency.name} ${dependency.version}: ${describeFailure(err)}`,
          { cause: err },
        );
      }
    },
  };
}

export function expandPlaceholders(
  template: string,
  values: { name: string; version: string; destination: string },
): string {
  return template
    .replaceAll("{name}", values.name)
    .replaceAll("{version}", values.version)
    .replaceAll("{destination}", values.destination);
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeFailure(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err) {
    const stderr = err.stderr;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }
  return err instanceof Error ? err.message : String(err);
}
