import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { GateConfigSchema, type GateConfig, type GateSettings } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type Env = Record<string, string | undefined>;

type ExpandContext = {
  file: string;
  trail: string[];
  env: Env;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Pass --config <path>, set GATE_CONFIG, or create gate.yaml.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun. templates/gate.yaml is a starting point.";

function resolveYamlErrorLocation(error: unknown): { line: number; column: number } | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }
  return { line: error.mark.line + 1, column: error.mark.column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function wrapConfigError(error: unknown): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Gate config invalid.",
      message: error.message,
      hint: INVALID_CONFIG_HINT,
      cause: error,
    });
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadGateConfig(configPath: string, env: Env = process.env): GateConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Gate config missing.",
      message: `Gate config not found at ${absolutePath}.`,
      hint: MISSING_CONFIG_HINT,
      cause: new ConfigError(`Gate config not found at ${absolutePath}.`),
    });
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read gate config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [], env });
    const parsed = GateConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid gate config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    // Relative directories are taken from the config file's location.
    return {
      ...cfg,
      base_dir: path.resolve(configDir, cfg.base_dir),
      logs_dir: path.resolve(configDir, cfg.logs_dir),
      workspace_cache_dir: cfg.workspace_cache_dir
        ? path.resolve(configDir, cfg.workspace_cache_dir)
        : undefined,
    };
  } catch (err) {
    wrapConfigError(err);
  }
}

export type SettingsOverrides = {
  queueBranch?: string;
  queueChangeRef?: string;
  projectUnderTest?: string;
  overrideBranch?: string;
  skipSelfProject?: boolean;
  logsDir?: string;
  debug?: boolean;
};

/**
 * Merge the config file with the merge-queue environment and CLI overrides.
 *
 * Environment keys follow the merge-queue's conventions (ZUUL_BRANCH, ZUUL_REF, ...);
 * empty strings count as unset.
 */
export function resolveGateSettings(
  config: GateConfig,
  env: Env = process.env,
  overrides: SettingsOverrides = {},
): GateSettings {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value && value.length > 0 ? value : undefined;
  };

  const changeUrl = read("ZUUL_URL") ?? config.change_url;
  const skipSelfProject =
    overrides.skipSelfProject ??
    (read("SKIP_GATE_SELF_PROJECT") !== undefined || config.skip_self_project);

  const workspace = read("GATE_WORKSPACE");
  const logsDir =
    overrides.logsDir ??
    read("GATE_LOGS_DIR") ??
    (workspace ? path.join(workspace, "logs") : config.logs_dir);

  const overrideBranch = overrides.overrideBranch ?? read("OVERRIDE_ZUUL_BRANCH");

  const settings: GateSettings = {
    config: Object.freeze({ ...config, change_url: changeUrl }),
    queue: Object.freeze({
      branch: overrides.queueBranch ?? read("ZUUL_BRANCH") ?? "",
      changeRef: overrides.queueChangeRef ?? read("ZUUL_REF") ?? "",
      projectUnderTest: overrides.projectUnderTest ?? read("ZUUL_PROJECT") ?? "",
      changes: read("ZUUL_CHANGES") ?? "",
      ...(overrideBranch ? { overrideBranch } : {}),
    }),
    skipSelfProject,
    reExec: read("GATE_RE_EXEC") === "true",
    logsDir: path.resolve(logsDir),
    debug: overrides.debug ?? false,
  };

  return Object.freeze(settings);
}
