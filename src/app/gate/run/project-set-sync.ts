/**
 * Project set orchestrator: one workspace pass over every project, in order.
 * Purpose: prepare, resolve and sync each project, stopping at the first failure.
 * Assumptions: the destination root is owned by this run; nothing runs in parallel.
 * Usage: await syncAll({ projectSet, branch, destinationRoot, queue, ... }, ports).
 */

import fse from "fs-extra";

import { GitError, type GateError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logGateEvent } from "../../../core/logger.js";
import type { QueueSettings } from "../../../core/config.js";
import { resolveRef } from "../resolve/ref-resolver.js";
import { prepareWorkTree, syncWorkTree, type SyncOptions, type SyncPorts } from "../sync/workspace-sync.js";
import { describeOutcome, fail, ok, type ProjectSet, type Result, type WorkspaceState } from "../types.js";

export type SyncAllRequest = SyncOptions & {
  projectSet: ProjectSet;
  branch: string;
  destinationRoot: string;
  queue: Pick<QueueSettings, "branch" | "changeRef" | "projectUnderTest" | "overrideBranch">;
};

export async function syncAll(
  request: SyncAllRequest,
  ports: SyncPorts,
): Promise<Result<WorkspaceState[], GateError>> {
  const { projectSet, branch, destinationRoot, queue } = request;

  try {
    await fse.ensureDir(destinationRoot);
  } catch (err) {
    return fail(
      new GitError(`Unable to create ${destinationRoot}: ${formatErrorMessage(err)}`, err),
    );
  }

  ports.say(`Using branch: ${branch}`);
  const states: WorkspaceState[] = [];

  for (const project of projectSet) {
    ports.say(`Setting up ${project} @ ${branch}`);
    logGateEvent(ports.events, "project.setup.start", { project, payload: { branch } });

    const prepared = await prepareWorkTree(project, destinationRoot, request, ports);
    if (!prepared.ok) {
      return abort(ports, project, prepared.error);
    }

    const outcome = await resolveRef(
      {
        project,
        workTree: prepared.result,
        requestedBranch: branch,
        queueBranch: queue.branch,
        queueChangeRef: queue.changeRef,
        overrideBranch: queue.overrideBranch,
        projectUnderTest: queue.projectUnderTest,
        changeUrl: request.changeUrl,
      },
      ports,
    );
    if (outcome.kind === "failed") {
      ports.say(outcome.reason);
    }

    const synced = await syncWorkTree(project, outcome, destinationRoot, request, ports);
    if (!synced.ok) {
      return abort(ports, project, synced.error);
    }

    logGateEvent(ports.events, "project.setup.complete", {
      project,
      payload: { outcome: describeOutcome(outcome), head: synced.result.headSha },
    });
    states.push(synced.result);
  }

  return ok(states);
}

function abort(
  ports: SyncPorts,
  project: string,
  error: GateError,
): { ok: false; error: GateError } {
  logGateEvent(ports.events, "project.setup.failed", {
    project,
    payload: { error: error.name, message: error.message },
  });
  return fail(error);
}
