/*
Pure helpers for merge-queue change references and remote branch listings.
Assumes references are opaque text; nothing here parses their structure.
*/

/**
 * Replace the first literal occurrence of `fromBranch` inside `reference` with `toBranch`.
 *
 * This is a blind text substitution: if `fromBranch` also appears outside the branch
 * segment of the reference, that earlier occurrence is the one rewritten.
 */
export function substituteBranch(reference: string, fromBranch: string, toBranch: string): string {
  if (reference.length === 0 || fromBranch.length === 0) return reference;

  const index = reference.indexOf(fromBranch);
  if (index === -1) return reference;

  return reference.slice(0, index) + toBranch + reference.slice(index + fromBranch.length);
}

// `git branch -a` output matched the way a fixed-string grep would: any line containing it.
export function hasRemoteBranch(branchListing: string[], branch: string, remote = "origin"): boolean {
  const needle = `remotes/${remote}/${branch}`;
  return branchListing.some((line) => line.includes(needle));
}

export function parseBranchListing(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.replace(/^[*+]?\s*/, "").trim())
    .filter((line) => line.length > 0);
}

export type QueueChange = {
  project: string;
  branch?: string;
  ref?: string;
};

// Change lists arrive as "project:branch:ref" entries joined by "^".
export function parseQueueChanges(raw: string | undefined): QueueChange[] {
  if (!raw) return [];

  return raw
    .split("^")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [project, branch, ...rest] = entry.split(":");
      const ref = rest.join(":");
      const change: QueueChange = { project };
      if (branch) change.branch = branch;
      if (ref) change.ref = ref;
      return change;
    });
}

export function queueChangesInclude(raw: string | undefined, project: string): boolean {
  return parseQueueChanges(raw).some((change) => change.project === project);
}

export function projectRemoteUrl(template: string, project: string): string {
  return template.includes("{project}")
    ? template.split("{project}").join(project)
    : `${template.replace(/\/+$/, "")}/${project}`;
}
