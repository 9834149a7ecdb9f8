import path from "node:path";

import type { GateConfig, GateSettings } from "../core/config.js";
import {
  loadGateConfig,
  resolveGateSettings,
  type SettingsOverrides,
} from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, then $GATE_CONFIG, then ./gate.yaml. The first candidate that is
// named wins even when the file is missing, so a typo fails loudly instead of
// silently falling through to another file.
// =============================================================================

export const DEFAULT_CONFIG_FILE = "gate.yaml";
export const CONFIG_ENV_VAR = "GATE_CONFIG";

export type ConfigSource = "explicit" | "env" | "cwd";

export type LoadSettingsForCliArgs = {
  explicitConfigPath?: string;
  overrides?: SettingsOverrides;
  env?: Record<string, string | undefined>;
  cwd?: string;
};

export function resolveGateConfigPath(args: {
  explicitConfigPath?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
}): { configPath: string; source: ConfigSource } {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  if (args.explicitConfigPath) {
    return { configPath: path.resolve(cwd, args.explicitConfigPath), source: "explicit" };
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  return { configPath: path.join(cwd, DEFAULT_CONFIG_FILE), source: "cwd" };
}

export function loadSettingsForCli(args: LoadSettingsForCliArgs): {
  config: GateConfig;
  configPath: string;
  settings: GateSettings;
} {
  const env = args.env ?? process.env;
  const { configPath } = resolveGateConfigPath({
    explicitConfigPath: args.explicitConfigPath,
    env,
    cwd: args.cwd,
  });

  const config = loadGateConfig(configPath, env);
  const settings: GateSettings = Object.freeze({
    ...resolveGateSettings(config, env, args.overrides),
    configPath,
  });
  return { config, configPath, settings };
}
