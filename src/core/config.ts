import { z } from "zod";

// =============================================================================
// FILE SCHEMA
// =============================================================================

const BranchPairSchema = z
  .object({
    old: z.string().min(1),
    new: z.string().min(1),
  })
  .strict();

const UpgradeSchema = z
  .object({
    mode: z.enum(["none", "backward", "forward"]).default("none"),
    // Keyed by merge-queue branch; "default" applies to backward upgrades of unlisted branches.
    branches: z
      .object({
        backward: z.record(z.string(), BranchPairSchema).default({}),
        forward: z.record(z.string(), BranchPairSchema).default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

const HooksSchema = z
  .object({
    pre_test: z.string().min(1).optional(),
    gate: z.string().min(1).optional(),
    post_test: z.string().min(1).optional(),
    timeout_seconds: z.number().int().positive().optional(),
  })
  .strict();

const SelfUpdateSchema = z
  .object({
    // Relative to the freshly synced gate tooling tree.
    entrypoint: z.string().min(1).default("gate-wrap.sh"),
  })
  .strict();

const TimeoutsSchema = z
  .object({
    fetch_seconds: z.number().int().positive().default(300),
    // Every other git command: clone, checkout, reset, clean, prune.
    git_seconds: z.number().int().positive().default(300),
  })
  .strict();

export const GateConfigSchema = z
  .object({
    projects: z.array(z.string().min(1)).default([]),
    self_project: z.string().min(1).optional(),
    skip_self_project: z.boolean().default(false),

    remote_url_template: z.string().min(1).default("https://git.openstack.org/{project}"),
    change_url: z.string().min(1).default("http://zuul.openstack.org/p"),

    base_dir: z.string().min(1).default("/opt/stack"),
    logs_dir: z.string().min(1).default("logs"),
    workspace_cache_dir: z.string().min(1).optional(),

    timeouts: TimeoutsSchema.default({}),
    upgrade: UpgradeSchema.default({}),
    self_update: SelfUpdateSchema.default({}),
    hooks: HooksSchema.default({}),
  })
  .strict();

export type GateConfig = z.infer<typeof GateConfigSchema>;
export type HooksConfig = GateConfig["hooks"];

// =============================================================================
// RUNTIME SETTINGS
// =============================================================================

export type QueueSettings = Readonly<{
  branch: string;
  changeRef: string;
  projectUnderTest: string;
  changes: string;
  overrideBranch?: string;
}>;

// Built once at startup and passed down; nothing below the CLI reads process.env.
export type GateSettings = Readonly<{
  config: Readonly<GateConfig>;
  // Absolute path of the file the config came from, when it came from one.
  configPath?: string;
  queue: QueueSettings;
  skipSelfProject: boolean;
  reExec: boolean;
  logsDir: string;
  debug: boolean;
}>;
