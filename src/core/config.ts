import { z } from "zod";

export const InstallerConfigSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1),
    // Extra environment for the installer process, on top of the resolver's own.
    env: z.record(z.string()).optional(),
  })
  .strict();

export const ResolverConfigSchema = z
  .object({
    build_dir: z.string().min(1).optional(),
    deps_dir: z.string().min(1).optional(),
    deps_idx: z.coerce.string().min(1).default("0"),
    manifest: z.string().min(1).optional(),
    install_root: z.string().min(1).optional(),
    verify_pinned_versions: z.boolean().default(false),
    log_file: z.string().min(1).optional(),
    installer: InstallerConfigSchema.optional(),
  })
  .strict();

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;

export const DEFAULT_CONFIG: ResolverConfig = ResolverConfigSchema.parse({});
