import os from "node:os";
import path from "node:path";

import { z } from "zod";

export const DEFAULT_BACKUP_DIR = path.join(os.tmpdir(), "git-conductor", "backups");

const BackupsSchema = z
  .object({
    enabled: z.boolean().default(true),
    dir: z.string().min(1).default(DEFAULT_BACKUP_DIR),
  })
  .strict();

export const ConductorConfigSchema = z
  .object({
    git_binary: z.string().min(1).default("git"),
    default_remote: z.string().min(1).default("origin"),

    // 0 disables the per-command timeout.
    command_timeout_ms: z.number().int().nonnegative().default(300_000),

    // One operation at a time per repository path.
    serialize_repo_operations: z.boolean().default(true),

    diff_max_chars: z.number().int().positive().default(10_000),
    conflict_preview_chars: z.number().int().positive().default(5_000),

    backups: BackupsSchema.default({}),

    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ConductorConfig = z.infer<typeof ConductorConfigSchema>;

export function defaultConductorConfig(): ConductorConfig {
  return ConductorConfigSchema.parse({});
}
