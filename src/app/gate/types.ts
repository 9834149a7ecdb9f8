/*
Shared gate data model: resolution outcomes, workspace state and the result envelope.
*/

import type { GateError } from "../../core/errors.js";

export type Project = string;

export type ProjectSet = readonly Project[];

export type ResolutionOutcome =
  | { kind: "change-ref"; ref: string }
  | { kind: "branch-head"; branch: string }
  | { kind: "failed"; reason: string; error: GateError };

export type WorkspaceState = {
  project: Project;
  path: string;
  // FETCH_HEAD for change references, remotes/origin/<branch> for branch heads.
  checkedOut: string;
  headSha: string;
  clean: boolean;
};

export type Result<T, E = Error> = { ok: true; result: T } | { ok: false; error: E };

export function ok<T>(result: T): { ok: true; result: T } {
  return { ok: true, result };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeOutcome(outcome: ResolutionOutcome): string {
  switch (outcome.kind) {
    case "change-ref":
      return `change ref ${outcome.ref}`;
    case "branch-head":
      return `branch head ${outcome.branch}`;
    case "failed":
      return `failed: ${outcome.reason}`;
  }
}
