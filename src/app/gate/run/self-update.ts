/**
 * Self-update hand-off.
 *
 * When the merge queue is testing a change to the gate tooling itself, the run syncs
 * only that project and hands control to the freshly checked-out copy. Contract:
 * - working directory: the synced gate tooling tree under <base_dir>/new
 * - flag: GATE_RE_EXEC=true in the child's environment, which disables this step there
 * - inputs: this run's resolved settings as environment (see handOffEnvironment); the
 *   config path and logs dir are absolute since the child starts in another directory.
 *   CLI flags reach the child only through these variables. Leftover operands are its args.
 * - output: streamed to the console while the child runs
 * - success: the child's exit code becomes this run's exit code (0 = success)
 */

import path from "node:path";

import type { CommandRunner } from "../../../core/command-runner.js";
import type { GateSettings } from "../../../core/config.js";
import { GateError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logGateEvent } from "../../../core/logger.js";
import { queueChangesInclude } from "../../../git/refs.js";
import { workTreePath, type SyncPorts } from "../sync/workspace-sync.js";
import { fail, ok, type Result } from "../types.js";

import { syncAll } from "./project-set-sync.js";

export const RE_EXEC_ENV = "GATE_RE_EXEC";

const SELF_UPDATE_BRANCH = "master";

export function needsSelfUpdate(
  settings: Pick<GateSettings, "config" | "queue" | "skipSelfProject" | "reExec">,
): boolean {
  const selfProject = settings.config.self_project;
  if (!selfProject || settings.skipSelfProject || settings.reExec) return false;
  return queueChangesInclude(settings.queue.changes, selfProject);
}

// The child reads these the same way this run read its own environment and flags.
export function handOffEnvironment(
  settings: Pick<GateSettings, "config" | "configPath" | "queue" | "logsDir">,
): Record<string, string> {
  const env: Record<string, string> = {
    [RE_EXEC_ENV]: "true",
    ZUUL_BRANCH: settings.queue.branch,
    ZUUL_REF: settings.queue.changeRef,
    ZUUL_PROJECT: settings.queue.projectUnderTest,
    ZUUL_URL: settings.config.change_url,
    ZUUL_CHANGES: settings.queue.changes,
    GATE_LOGS_DIR: path.resolve(settings.logsDir),
  };
  if (settings.configPath) env.GATE_CONFIG = path.resolve(settings.configPath);
  if (settings.queue.overrideBranch) env.OVERRIDE_ZUUL_BRANCH = settings.queue.overrideBranch;
  return env;
}

export type HandOffDeps = {
  ports: SyncPorts;
  runner: CommandRunner;
  args?: string[];
};

export async function handOffToUpdatedTooling(
  settings: GateSettings,
  deps: HandOffDeps,
): Promise<Result<number, GateError>> {
  const selfProject = settings.config.self_project;
  if (!selfProject) {
    return fail(new GateError("No self_project configured for the self-update hand-off."));
  }

  deps.ports.say("This build includes a change to the gate tooling; handing off to the updated copy.");
  const destinationRoot = path.join(settings.config.base_dir, "new");

  const synced = await syncAll(
    {
      projectSet: [selfProject],
      branch: SELF_UPDATE_BRANCH,
      destinationRoot,
      queue: settings.queue,
      remoteUrlTemplate: settings.config.remote_url_template,
      changeUrl: settings.config.change_url,
    },
    deps.ports,
  );
  if (!synced.ok) return synced;

  const toolingDir = workTreePath(destinationRoot, selfProject);
  const entrypoint = path.join(toolingDir, settings.config.self_update.entrypoint);
  logGateEvent(deps.ports.events, "selfupdate.handoff", {
    project: selfProject,
    payload: { entrypoint, cwd: toolingDir },
  });

  try {
    const res = await deps.runner.run(entrypoint, deps.args ?? [], {
      cwd: toolingDir,
      env: handOffEnvironment(settings),
      streamOutput: true,
    });
    return ok(res.exitCode);
  } catch (err) {
    return fail(
      err instanceof GateError
        ? err
        : new GateError(`Unable to run ${entrypoint}: ${formatErrorMessage(err)}`, err),
    );
  }
}
