import path from "node:path";

import { createGitVcs } from "../app/gate/vcs/git-vcs.js";
import { mathRandom, systemPause, type GatePorts } from "../app/gate/ports.js";
import { resolveRef } from "../app/gate/resolve/ref-resolver.js";
import { runGate, type GateRunDeps } from "../app/gate/run/gate-run.js";
import { buildProjectSet } from "../app/gate/run/project-set.js";
import { syncAll } from "../app/gate/run/project-set-sync.js";
import { prepareWorkTree } from "../app/gate/sync/workspace-sync.js";
import type { ResolutionOutcome } from "../app/gate/types.js";
import { createExecaCommandRunner, type CommandRunner } from "../core/command-runner.js";
import type { GateSettings } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  CommandSpawnError,
  ConfigError,
  ConfigurationInconsistentError,
  GitError,
  HookError,
  RefNotFoundError,
  RemoteUnreachableError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";
import { JsonlLogger, type JsonObject } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// WIRING
// =============================================================================

type CliRuntime = {
  runner: CommandRunner;
  openLog: (name: string) => JsonlLogger;
  ports: Omit<GatePorts, "events">;
};

function createCliRuntime(settings: GateSettings): CliRuntime {
  const runner = createExecaCommandRunner();
  const runId = defaultRunId();

  return {
    runner,
    openLog: (name) =>
      new JsonlLogger(path.join(settings.logsDir, `${name}.jsonl`), { runId }, settings.debug),
    ports: {
      vcs: createGitVcs({
        runner,
        fetchTimeoutSeconds: settings.config.timeouts.fetch_seconds,
        gitTimeoutSeconds: settings.config.timeouts.git_seconds,
      }),
      pause: systemPause,
      random: mathRandom,
      say: (line) => console.log(line),
    },
  };
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function runCommand(
  settings: GateSettings,
  opts: { handOffArgs?: string[] } = {},
): Promise<void> {
  const runtime = createCliRuntime(settings);
  const deps: GateRunDeps = {
    ...runtime.ports,
    runner: runtime.runner,
    openLog: runtime.openLog,
    handOffArgs: opts.handOffArgs,
  };

  const result = await runGate(settings, deps);
  if (result.error) {
    console.error(
      renderCliError(normalizeGateCommandError(result.error, RUN_FAILURE_TITLE), {
        debug: settings.debug,
      }),
    );
  }

  console.log(`Gate finished with exit code ${result.exitCode}. Logs: ${settings.logsDir}`);
  process.exitCode = result.exitCode;
}

export async function syncCommand(
  settings: GateSettings,
  opts: { branch: string; dest: string },
): Promise<void> {
  const runtime = createCliRuntime(settings);
  const events = runtime.openLog("sync");

  try {
    const projectSet = buildProjectSet({
      projects: settings.config.projects,
      selfProject: settings.config.self_project,
      skipSelfProject: settings.skipSelfProject,
    });

    const synced = await syncAll(
      {
        projectSet,
        branch: opts.branch,
        destinationRoot: path.resolve(opts.dest),
        queue: settings.queue,
        remoteUrlTemplate: settings.config.remote_url_template,
        changeUrl: settings.config.change_url,
      },
      { ...runtime.ports, events },
    );
    if (!synced.ok) throw synced.error;

    for (const state of synced.result) {
      const dirty = state.clean ? "" : " (dirty)";
      console.log(`${state.project} ${state.headSha} ${state.checkedOut}${dirty}`);
    }
  } catch (error) {
    throw normalizeGateCommandError(error, SYNC_FAILURE_TITLE);
  } finally {
    events.close();
  }
}

export async function resolveCommand(
  settings: GateSettings,
  opts: { project: string; branch: string; dest: string },
): Promise<void> {
  const runtime = createCliRuntime(settings);
  const events = runtime.openLog("resolve");
  const destinationRoot = path.resolve(opts.dest);
  const ports = { ...runtime.ports, events };

  try {
    const prepared = await prepareWorkTree(
      opts.project,
      destinationRoot,
      {
        remoteUrlTemplate: settings.config.remote_url_template,
        changeUrl: settings.config.change_url,
      },
      ports,
    );
    if (!prepared.ok) throw prepared.error;

    const outcome = await resolveRef(
      {
        project: opts.project,
        workTree: prepared.result,
        requestedBranch: opts.branch,
        queueBranch: settings.queue.branch,
        queueChangeRef: settings.queue.changeRef,
        overrideBranch: settings.queue.overrideBranch,
        projectUnderTest: settings.queue.projectUnderTest,
        changeUrl: settings.config.change_url,
      },
      ports,
    );

    console.log(JSON.stringify(outcomeToJson(opts.project, outcome), null, 2));
    if (outcome.kind === "failed") throw outcome.error;
  } catch (error) {
    throw normalizeGateCommandError(error, RESOLVE_FAILURE_TITLE);
  } finally {
    events.close();
  }
}

export function projectsCommand(settings: GateSettings): void {
  const projectSet = buildProjectSet({
    projects: settings.config.projects,
    selfProject: settings.config.self_project,
    skipSelfProject: settings.skipSelfProject,
  });

  for (const project of projectSet) {
    console.log(project);
  }
}

export function outcomeToJson(project: string, outcome: ResolutionOutcome): JsonObject {
  switch (outcome.kind) {
    case "change-ref":
      return { project, kind: outcome.kind, ref: outcome.ref };
    case "branch-head":
      return { project, kind: outcome.kind, branch: outcome.branch };
    case "failed":
      return { project, kind: outcome.kind, reason: outcome.reason, error: outcome.error.name };
  }
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_FAILURE_TITLE = "Gate run failed.";
const SYNC_FAILURE_TITLE = "Workspace sync failed.";
const RESOLVE_FAILURE_TITLE = "Ref resolution failed.";

const CONFIG_HINT = "Check the gate config and the ZUUL_* environment, then rerun.";
const RESOLVE_HINT =
  "Check that the change reference exists on the change server, or set OVERRIDE_ZUUL_BRANCH.";
const INCONSISTENT_HINT =
  "The project under test has no such branch; the merge queue and the project list disagree.";
const GIT_HINT = "Inspect the setup-workspace logs; the remote may be down or the tree damaged.";
const HOOK_HINT = "See the hook output under the logs directory.";

export function normalizeGateCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveGateErrorCode(error),
    title,
    message: formatErrorMessage(error),
    hint: resolveGateErrorHint(error),
    cause: error,
  });
}

function resolveGateErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof RefNotFoundError || error instanceof ConfigurationInconsistentError) {
    return USER_FACING_ERROR_CODES.resolve;
  }
  if (error instanceof HookError) return USER_FACING_ERROR_CODES.hook;
  if (isGitFailure(error)) return USER_FACING_ERROR_CODES.git;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveGateErrorHint(error: unknown): string | undefined {
  if (error instanceof ConfigError) return CONFIG_HINT;
  if (error instanceof ConfigurationInconsistentError) return INCONSISTENT_HINT;
  if (error instanceof RefNotFoundError) return RESOLVE_HINT;
  if (error instanceof HookError) return HOOK_HINT;
  if (isGitFailure(error)) return GIT_HINT;
  return undefined;
}

function isGitFailure(error: unknown): boolean {
  return (
    error instanceof GitError ||
    error instanceof RemoteUnreachableError ||
    error instanceof CommandSpawnError
  );
}
