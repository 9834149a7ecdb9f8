/**
 * Full gate run: project set, optional self-update hand-off, workspace passes, hooks.
 *
 * Every fatal condition returns before any hook runs, with an exit code from
 * GATE_EXIT_CODES so the CI system can tell a missing ref from a dead remote.
 */

import path from "node:path";

import fse from "fs-extra";

import type { CommandRunner } from "../../../core/command-runner.js";
import type { GateSettings } from "../../../core/config.js";
import { GATE_EXIT_CODES, resolveGateExitCode, type GateError } from "../../../core/errors.js";
import { logGateEvent, type ClosableEventSink } from "../../../core/logger.js";
import { hookFailure, runGateHooks } from "../hooks/hooks.js";
import type { GatePorts } from "../ports.js";
import type { ProjectSet, Result, WorkspaceState } from "../types.js";

import { buildProjectSet } from "./project-set.js";
import { syncAll } from "./project-set-sync.js";
import { handOffToUpdatedTooling, needsSelfUpdate } from "./self-update.js";
import { planWorkspacePasses, type WorkspacePass, type WorkspacePassName } from "./upgrade-plan.js";
import { seedFromCache } from "./workspace-cache.js";

// =============================================================================
// TYPES
// =============================================================================

export type GateRunDeps = Omit<GatePorts, "events"> & {
  runner: CommandRunner;
  // Opens <logsDir>/<name>.jsonl (or an in-memory sink in tests).
  openLog: (name: string) => ClosableEventSink;
  handOffArgs?: string[];
};

export type GateRunResult = {
  exitCode: number;
  error?: GateError;
  handedOff: boolean;
  projectSet: ProjectSet;
  workspaces: Partial<Record<WorkspacePassName, WorkspaceState[]>>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runGate(settings: GateSettings, deps: GateRunDeps): Promise<GateRunResult> {
  await fse.emptyDir(settings.logsDir);
  const gateLog = deps.openLog("gate");

  const projectSet = buildProjectSet({
    projects: settings.config.projects,
    selfProject: settings.config.self_project,
    skipSelfProject: settings.skipSelfProject,
  });
  const result: GateRunResult = {
    exitCode: GATE_EXIT_CODES.success,
    handedOff: false,
    projectSet,
    workspaces: {},
  };

  logGateEvent(gateLog, "gate.start", {
    payload: {
      queue_branch: settings.queue.branch,
      queue_ref: settings.queue.changeRef,
      project_under_test: settings.queue.projectUnderTest,
      projects: projectSet.length,
      re_exec: settings.reExec,
    },
  });

  try {
    if (needsSelfUpdate(settings)) {
      const handOff = await handOffToUpdatedTooling(settings, {
        ports: { ...deps, events: gateLog },
        runner: deps.runner,
        args: deps.handOffArgs,
      });
      if (!handOff.ok) return finish(gateLog, result, handOff.error);

      result.handedOff = true;
      result.exitCode = handOff.result;
      return finish(gateLog, result);
    }

    const passes = planWorkspacePasses(settings);
    if (!passes.ok) return finish(gateLog, result, passes.error);

    for (const pass of passes.result) {
      const synced = await runWorkspacePass(settings, deps, projectSet, pass);
      if (!synced.ok) return finish(gateLog, result, synced.error);
      result.workspaces[pass.name] = synced.result;
    }

    const newRoot = path.join(settings.config.base_dir, "new");
    const hooks = await runGateHooks(settings.config.hooks, {
      runner: deps.runner,
      cwd: newRoot,
      logsDir: settings.logsDir,
      env: hookEnvironment(settings, passes.result),
      events: gateLog,
      say: deps.say,
    });
    if (!hooks.ok) return finish(gateLog, result, hooks.error);

    result.exitCode = hooks.result.exitCode;
    return finish(gateLog, result, hookFailure(hooks.result) ?? undefined);
  } finally {
    gateLog.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runWorkspacePass(
  settings: GateSettings,
  deps: GateRunDeps,
  projectSet: ProjectSet,
  pass: WorkspacePass,
): Promise<Result<WorkspaceState[], GateError>> {
  const passLog = deps.openLog(`setup-workspace-${pass.name}`);
  try {
    logGateEvent(passLog, "pass.start", {
      payload: { pass: pass.name, branch: pass.branch, destination: pass.destinationRoot },
    });

    const seeded = await seedFromCache(settings.config.workspace_cache_dir, pass.destinationRoot);
    if (seeded > 0) {
      logGateEvent(passLog, "workspace.cache.seeded", { payload: { entries: seeded } });
    }

    const synced = await syncAll(
      {
        projectSet,
        branch: pass.branch,
        destinationRoot: pass.destinationRoot,
        queue: settings.queue,
        remoteUrlTemplate: settings.config.remote_url_template,
        changeUrl: settings.config.change_url,
      },
      { ...deps, events: passLog },
    );

    logGateEvent(passLog, "pass.complete", {
      payload: { pass: pass.name, ok: synced.ok },
    });
    return synced;
  } finally {
    passLog.close();
  }
}

function hookEnvironment(settings: GateSettings, passes: WorkspacePass[]): Record<string, string> {
  const env: Record<string, string> = {
    GATE_BASE_DIR: settings.config.base_dir,
    GATE_LOGS_DIR: settings.logsDir,
    GATE_QUEUE_BRANCH: settings.queue.branch,
    GATE_PROJECT_UNDER_TEST: settings.queue.projectUnderTest,
  };

  for (const pass of passes) {
    const key = pass.name === "new" ? "GATE_UPGRADE_NEW_BRANCH" : "GATE_UPGRADE_OLD_BRANCH";
    env[key] = pass.branch;
  }

  return env;
}

function finish(
  gateLog: ClosableEventSink,
  result: GateRunResult,
  error?: GateError,
): GateRunResult {
  if (error) {
    result.error = error;
    if (result.exitCode === GATE_EXIT_CODES.success) {
      result.exitCode = resolveGateExitCode(error);
    }
  }

  logGateEvent(gateLog, "gate.complete", {
    payload: {
      exit_code: result.exitCode,
      handed_off: result.handedOff,
      ...(error ? { error: error.name, message: error.message } : {}),
    },
  });
  return result;
}
