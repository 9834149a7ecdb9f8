/**
 * Decides which ref each project's working tree should be checked out at.
 *
 * Inputs are the branch requested for the workspace pass and the merge queue's
 * speculative state (its target branch and change reference). The resolver needs a
 * working tree whose remote-tracking refs are already refreshed; it fetches candidate
 * change references into that tree but never moves HEAD. An unreachable change server is
 * retried with backoff; resolution fails only once those attempts run out.
 */

import {
  ConfigurationInconsistentError,
  GitError,
  RefNotFoundError,
  RemoteUnreachableError,
} from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logGateEvent } from "../../../core/logger.js";
import { hasRemoteBranch, projectRemoteUrl, substituteBranch } from "../../../git/refs.js";
import type { GatePorts } from "../ports.js";
import { REMOTE_ATTEMPTS, fetchRefWithRetry } from "../sync/remote-retry.js";
import type { Project, ResolutionOutcome } from "../types.js";

// =============================================================================
// TYPES
// =============================================================================

export const FALLBACK_BRANCH = "master";

export type ResolveRequest = {
  project: Project;
  workTree: string;
  requestedBranch: string;
  queueBranch: string;
  queueChangeRef: string;
  overrideBranch?: string;
  projectUnderTest: string;
  // Base URL (or {project} template) the merge queue serves change references from.
  changeUrl: string;
};

export type CandidatePlan = {
  effectiveBranch: string;
  branchFellBack: boolean;
  overrideRef: string;
  primaryRef: string;
  fallbackRef: string;
};

export type ResolverDeps = Pick<GatePorts, "vcs" | "events" | "pause" | "random">;

// =============================================================================
// PLANNING
// =============================================================================

export function planCandidates(
  request: Pick<ResolveRequest, "requestedBranch" | "queueChangeRef" | "overrideBranch">,
  branchExists: boolean,
): CandidatePlan {
  const { requestedBranch, queueChangeRef, overrideBranch } = request;

  const overrideRef = overrideBranch
    ? substituteBranch(queueChangeRef, requestedBranch, overrideBranch)
    : "";

  if (branchExists) {
    return {
      effectiveBranch: requestedBranch,
      branchFellBack: false,
      overrideRef,
      primaryRef: queueChangeRef,
      fallbackRef: "",
    };
  }

  return {
    effectiveBranch: FALLBACK_BRANCH,
    branchFellBack: true,
    overrideRef,
    primaryRef: queueChangeRef,
    fallbackRef: substituteBranch(queueChangeRef, requestedBranch, FALLBACK_BRANCH),
  };
}

// Override, then primary, then fallback. Empty and repeated candidates are dropped.
export function orderedCandidates(plan: CandidatePlan): string[] {
  const ordered: string[] = [];
  for (const ref of [plan.overrideRef, plan.primaryRef, plan.fallbackRef]) {
    if (ref.length > 0 && !ordered.includes(ref)) {
      ordered.push(ref);
    }
  }
  return ordered;
}

// =============================================================================
// RESOLUTION
// =============================================================================

export async function resolveRef(
  request: ResolveRequest,
  deps: ResolverDeps,
): Promise<ResolutionOutcome> {
  const { project, workTree, requestedBranch } = request;

  let branchListing: string[];
  try {
    branchListing = await deps.vcs.listBranches(workTree);
  } catch (err) {
    return {
      kind: "failed",
      reason: `unable to list branches for ${project}`,
      error: new GitError(
        `Unable to list branches for ${project}: ${formatErrorMessage(err)}`,
        err,
      ),
    };
  }

  const plan = planCandidates(request, hasRemoteBranch(branchListing, requestedBranch));
  if (plan.branchFellBack) {
    logGateEvent(deps.events, "resolve.branch.fallback", {
      project,
      payload: { requested: requestedBranch, effective: plan.effectiveBranch },
    });
  }

  if (request.queueBranch !== plan.effectiveBranch) {
    return branchHead(deps, project, plan.effectiveBranch, "queue branch differs");
  }

  const fetchUrl = projectRemoteUrl(request.changeUrl, project);
  for (const ref of orderedCandidates(plan)) {
    const fetched = await fetchRefWithRetry(project, workTree, fetchUrl, ref, deps);
    if (fetched.kind === "fetched") {
      logGateEvent(deps.events, "resolve.outcome", {
        project,
        payload: { kind: "change-ref", ref },
      });
      return { kind: "change-ref", ref };
    }

    if (fetched.kind === "unreachable") {
      const error = new RemoteUnreachableError(
        `Unable to reach ${fetchUrl} after ${REMOTE_ATTEMPTS} attempts while fetching ${ref}: ${fetched.detail}`,
        project,
      );
      logGateEvent(deps.events, "resolve.outcome", {
        project,
        payload: { kind: "failed", ref, reason: "remote unreachable" },
      });
      return { kind: "failed", reason: "remote unreachable", error };
    }

    logGateEvent(deps.events, "resolve.candidate.miss", {
      project,
      payload: { ref, detail: fetched.detail },
    });
  }

  if (project === request.projectUnderTest) {
    const error = plan.branchFellBack
      ? new ConfigurationInconsistentError(
          `Branch ${requestedBranch} does not exist for ${project} and no change reference resolved (tried ${describeTried(plan)}).`,
          project,
          requestedBranch,
        )
      : new RefNotFoundError(
          `Unable to find ref ${request.queueChangeRef || "<empty>"} for ${project}`,
          project,
          request.queueChangeRef,
        );
    logGateEvent(deps.events, "resolve.outcome", {
      project,
      payload: { kind: "failed", reason: error.name },
    });
    return { kind: "failed", reason: error.message, error };
  }

  return branchHead(deps, project, plan.effectiveBranch, "no change reference resolved");
}

// =============================================================================
// INTERNALS
// =============================================================================

function branchHead(
  deps: ResolverDeps,
  project: Project,
  branch: string,
  reason: string,
): ResolutionOutcome {
  logGateEvent(deps.events, "resolve.outcome", {
    project,
    payload: { kind: "branch-head", branch, reason },
  });
  return { kind: "branch-head", branch };
}

function describeTried(plan: CandidatePlan): string {
  const tried = orderedCandidates(plan);
  return tried.length > 0 ? tried.join(", ") : "no candidates";
}
