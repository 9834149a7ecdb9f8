/**
 * Bounded retries for operations that reach a remote.
 * Purpose: one attempt budget and one randomized backoff for remote refreshes and ref fetches.
 * Assumptions: only unreachable results are retried; not-found returns at once.
 * Usage: fetchRefWithRetry(...) from the resolver and the synchronizer.
 */

import { logGateEvent } from "../../../core/logger.js";
import type { GatePorts } from "../ports.js";
import type { Project } from "../types.js";
import type { FetchRefResult } from "../vcs/vcs.js";

export const REMOTE_ATTEMPTS = 3;
export const REMOTE_BACKOFF_MIN_SECONDS = 30;
export const REMOTE_BACKOFF_SPREAD_SECONDS = 60;

export type RetryPorts = Pick<GatePorts, "vcs" | "events" | "pause" | "random">;

// Whole seconds in [30, 89].
export function remoteRetryBackoffMs(randomValue: number): number {
  const spread = Math.floor(randomValue * REMOTE_BACKOFF_SPREAD_SECONDS);
  const bounded = Math.min(Math.max(spread, 0), REMOTE_BACKOFF_SPREAD_SECONDS - 1);
  return (REMOTE_BACKOFF_MIN_SECONDS + bounded) * 1000;
}

// Returns the last result: fetched, not-found, or unreachable once the budget is spent.
export async function fetchRefWithRetry(
  project: Project,
  workTree: string,
  url: string,
  ref: string,
  ports: RetryPorts,
): Promise<FetchRefResult> {
  for (let attempt = 1; ; attempt += 1) {
    const fetched = await ports.vcs.fetchRef(workTree, url, ref);
    if (fetched.kind !== "unreachable" || attempt === REMOTE_ATTEMPTS) {
      if (fetched.kind === "unreachable") {
        logGateEvent(ports.events, "fetch.exhausted", {
          project,
          payload: { ref, attempts: REMOTE_ATTEMPTS, detail: fetched.detail },
        });
      }
      return fetched;
    }

    const backoffMs = remoteRetryBackoffMs(ports.random.next());
    logGateEvent(ports.events, "fetch.retry", {
      project,
      payload: { attempt, ref, backoff_ms: backoffMs, detail: fetched.detail },
    });
    await ports.pause.sleep(backoffMs);
  }
}
