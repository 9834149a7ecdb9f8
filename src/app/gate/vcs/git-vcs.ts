/**
 * Git-backed VCS adapter.
 * Purpose: map GateVcs calls onto the git helpers through one command runner.
 * Assumptions: git is on PATH; fetches share one timeout, every other git command another.
 * Usage: createGitVcs({ runner, fetchTimeoutSeconds, gitTimeoutSeconds }).
 */

import type { CommandRunner } from "../../../core/command-runner.js";
import {
  checkout,
  cleanWorkingTree,
  cloneRepo,
  fetchRef,
  headSha,
  isWorkingTreeClean,
  listBranches,
  pruneRemote,
  remoteUpdate,
  resetHard,
  setRemoteUrl,
} from "../../../git/git.js";

import type { GateVcs } from "./vcs.js";

export type GitVcsOptions = {
  runner: CommandRunner;
  fetchTimeoutSeconds?: number;
  gitTimeoutSeconds?: number;
};

export function createGitVcs(options: GitVcsOptions): GateVcs {
  const { runner, fetchTimeoutSeconds, gitTimeoutSeconds: timeout } = options;

  return {
    clone: (parentDir, url, dirName) => cloneRepo(runner, parentDir, url, dirName, timeout),
    setRemoteUrl: (workTree, url) => setRemoteUrl(runner, workTree, url, timeout),
    remoteUpdate: (workTree, timeoutSeconds) => remoteUpdate(runner, workTree, timeoutSeconds),
    pruneRemote: (workTree) => pruneRemote(runner, workTree, timeout),
    listBranches: (workTree) => listBranches(runner, workTree, timeout),
    fetchRef: (workTree, url, ref) => fetchRef(runner, workTree, url, ref, fetchTimeoutSeconds),
    checkout: (workTree, ref) => checkout(runner, workTree, ref, timeout),
    resetHard: (workTree, ref) => resetHard(runner, workTree, ref, timeout),
    clean: (workTree) => cleanWorkingTree(runner, workTree, timeout),
    headSha: (workTree) => headSha(runner, workTree, timeout),
    isClean: (workTree) => isWorkingTreeClean(runner, workTree, timeout),
  };
}
