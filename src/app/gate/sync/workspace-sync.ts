/**
 * Workspace synchronizer: brings one project's working tree to a resolved ref.
 *
 * prepareWorkTree() runs before resolution (clone, canonical origin, remote refresh,
 * prune); syncWorkTree() materializes the outcome afterwards and leaves the tree clean.
 */

import path from "node:path";

import fse from "fs-extra";

import { GateError, GitError, RemoteUnreachableError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logGateEvent } from "../../../core/logger.js";
import { projectShortName } from "../../../core/utils.js";
import { projectRemoteUrl } from "../../../git/refs.js";
import type { GatePorts } from "../ports.js";
import {
  fail,
  ok,
  type Project,
  type ResolutionOutcome,
  type Result,
  type WorkspaceState,
} from "../types.js";

import { REMOTE_ATTEMPTS, fetchRefWithRetry, remoteRetryBackoffMs } from "./remote-retry.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const REMOTE_UPDATE_TIMEOUT_SECONDS = 5 * 60;
export const CLEAN_RETRY_DELAY_MS = 1000;

const FETCH_HEAD = "FETCH_HEAD";

// =============================================================================
// TYPES
// =============================================================================

export type SyncOptions = {
  // Canonical origin, e.g. https://git.example.org/{project}.
  remoteUrlTemplate: string;
  changeUrl: string;
};

export type SyncPorts = Pick<GatePorts, "vcs" | "events" | "pause" | "random" | "say">;

// =============================================================================
// PREPARE
// =============================================================================

export function workTreePath(destinationRoot: string, project: Project): string {
  return path.join(destinationRoot, projectShortName(project));
}

export async function prepareWorkTree(
  project: Project,
  destinationRoot: string,
  options: SyncOptions,
  ports: SyncPorts,
): Promise<Result<string, GateError>> {
  const shortName = projectShortName(project);
  const workTree = workTreePath(destinationRoot, project);
  const originUrl = projectRemoteUrl(options.remoteUrlTemplate, project);

  try {
    if (!(await fse.pathExists(workTree))) {
      ports.say(`  Need to clone ${shortName}`);
      logGateEvent(ports.events, "workspace.clone.start", { project, payload: { url: originUrl } });
      await ports.vcs.clone(destinationRoot, originUrl, shortName);
    }

    await ports.vcs.setRemoteUrl(workTree, originUrl);
  } catch (err) {
    return fail(toGateError(err, `Unable to set up ${project} in ${destinationRoot}`));
  }

  const refreshed = await refreshRemote(project, workTree, ports);
  if (!refreshed.ok) return refreshed;

  try {
    await ports.vcs.pruneRemote(workTree);
  } catch (err) {
    return fail(toGateError(err, `Unable to prune stale remote branches for ${project}`));
  }

  return ok(workTree);
}

async function refreshRemote(
  project: Project,
  workTree: string,
  ports: SyncPorts,
): Promise<Result<void, GateError>> {
  let lastDetail = "";

  for (let attempt = 1; attempt <= REMOTE_ATTEMPTS; attempt += 1) {
    const res = await ports.vcs.remoteUpdate(workTree, REMOTE_UPDATE_TIMEOUT_SECONDS);
    if (res.exitCode === 0) {
      return ok(undefined);
    }

    lastDetail = res.timedOut
      ? `timed out after ${REMOTE_UPDATE_TIMEOUT_SECONDS}s`
      : res.stderr.trim() || `exit ${res.exitCode}`;
    ports.say("git remote update failed.");

    if (attempt === REMOTE_ATTEMPTS) break;

    const backoffMs = remoteRetryBackoffMs(ports.random.next());
    logGateEvent(ports.events, "remote.update.retry", {
      project,
      payload: { attempt, backoff_ms: backoffMs, detail: lastDetail },
    });
    ports.say(`sleep ${backoffMs / 1000} before retrying.`);
    await ports.pause.sleep(backoffMs);
  }

  logGateEvent(ports.events, "remote.update.exhausted", {
    project,
    payload: { attempts: REMOTE_ATTEMPTS, detail: lastDetail },
  });
  return fail(
    new RemoteUnreachableError(
      `git remote update failed ${REMOTE_ATTEMPTS} times for ${project}: ${lastDetail}`,
      project,
    ),
  );
}

// =============================================================================
// SYNC
// =============================================================================

export async function syncWorkTree(
  project: Project,
  outcome: ResolutionOutcome,
  destinationRoot: string,
  options: SyncOptions,
  ports: SyncPorts,
): Promise<Result<WorkspaceState, GateError>> {
  if (outcome.kind === "failed") {
    return fail(outcome.error);
  }

  const workTree = workTreePath(destinationRoot, project);
  let checkedOut: string;

  try {
    if (outcome.kind === "change-ref") {
      const fetchUrl = projectRemoteUrl(options.changeUrl, project);
      const fetched = await fetchRefWithRetry(project, workTree, fetchUrl, outcome.ref, ports);
      if (fetched.kind === "unreachable") {
        return fail(
          new RemoteUnreachableError(
            `Unable to reach ${fetchUrl} after ${REMOTE_ATTEMPTS} attempts while fetching ${outcome.ref}: ${fetched.detail}`,
            project,
          ),
        );
      }
      if (fetched.kind === "not-found") {
        return fail(
          new GitError(`Change reference ${outcome.ref} vanished for ${project}: ${fetched.detail}`),
        );
      }

      checkedOut = FETCH_HEAD;
      await ports.vcs.checkout(workTree, FETCH_HEAD);
      await ports.vcs.resetHard(workTree, FETCH_HEAD);
    } else {
      checkedOut = `remotes/origin/${outcome.branch}`;
      await ports.vcs.checkout(workTree, outcome.branch);
      await ports.vcs.resetHard(workTree, checkedOut);
    }
  } catch (err) {
    return fail(toGateError(err, `Unable to check out ${project}`));
  }

  logGateEvent(ports.events, "workspace.checkout", { project, payload: { ref: checkedOut } });
  const cleaned = await cleanWithRetry(project, workTree, ports);

  try {
    const sha = await ports.vcs.headSha(workTree);
    const clean = cleaned && (await ports.vcs.isClean(workTree));
    return ok({ project, path: workTree, checkedOut, headSha: sha, clean });
  } catch (err) {
    return fail(toGateError(err, `Unable to read HEAD for ${project}`));
  }
}

// A second failed clean only leaves stray files behind, so it is logged and tolerated.
async function cleanWithRetry(project: Project, workTree: string, ports: SyncPorts): Promise<boolean> {
  if (await ports.vcs.clean(workTree)) return true;

  logGateEvent(ports.events, "workspace.clean.retry", { project });
  await ports.pause.sleep(CLEAN_RETRY_DELAY_MS);
  if (await ports.vcs.clean(workTree)) return true;

  logGateEvent(ports.events, "workspace.clean.tolerated", {
    project,
    payload: { condition: "TreeCorrupt", work_tree: workTree },
  });
  ports.say(`  Warning: unable to clean ${workTree}; continuing.`);
  return false;
}

function toGateError(err: unknown, message: string): GateError {
  if (err instanceof GateError) return err;
  return new GitError(`${message}: ${formatErrorMessage(err)}`, err);
}
