import { buildResolverContext, type ResolverContext, type ResolverOverrides } from "../app/resolver-context.js";
import { DEFAULT_CONFIG, type ResolverConfig } from "../core/config.js";
import { resolveConfigPath, type ConfigSource } from "../core/config-discovery.js";
import { loadResolverConfig } from "../core/config-loader.js";
import { ConsoleLogger, type EventLogger } from "../core/logger.js";

export type GlobalOptions = ResolverOverrides & {
  config?: string;
  debug?: boolean;
  quiet?: boolean;
};

export function loadConfigForCli(args: { explicitConfigPath?: string; cwd?: string }): {
  config: ResolverConfig;
  configPath: string | null;
  source: ConfigSource;
} {
  const resolved = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd: args.cwd });
  const config = resolved.configPath ? loadResolverConfig(resolved.configPath) : DEFAULT_CONFIG;
  return { config, configPath: resolved.configPath, source: resolved.source };
}

export function loadContextForCli(
  opts: GlobalOptions,
  deps: { cwd?: string; logger?: EventLogger } = {},
): ResolverContext {
  const { config } = loadConfigForCli({ explicitConfigPath: opts.config, cwd: deps.cwd });
  const logger = deps.logger ?? (opts.quiet ? undefined : new ConsoleLogger());

  return buildResolverContext({
    config,
    overrides: {
      buildDir: opts.buildDir,
      depsDir: opts.depsDir,
      depsIdx: opts.depsIdx,
      manifest: opts.manifest,
    },
    logger,
    cwd: deps.cwd,
  });
}
