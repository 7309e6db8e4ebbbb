/**
 * Installer port.
 * Purpose: the capability that fetches and unpacks a dependency into a destination root.
 * Assumptions: implementations are idempotent enough to be called once per missing version.
 * Usage: implement for real installs (command-installer.ts) or as an in-memory fake in tests.
 */

// =============================================================================
// TYPES
// =============================================================================

export type Dependency = {
  name: string;
  version: string;
};

export interface Installer {
  installDependency(dependency: Dependency, destination: string): Promise<void>;
}
