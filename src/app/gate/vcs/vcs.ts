/**
 * VCS adapter interface for gate workspace preparation.
 * Purpose: the operations the resolver and synchronizer need from a remote-backed working tree.
 * Assumptions: implementations operate on local clones; remotes are reached through URLs.
 * Usage: createGitVcs(runner) in production, an in-memory fake in resolver tests.
 */

import type { CommandResult } from "../../../core/command-runner.js";
import type { FetchRefResult } from "../../../git/git.js";

export type { FetchRefResult };

export interface GateVcs {
  clone(parentDir: string, url: string, dirName: string): Promise<void>;
  setRemoteUrl(workTree: string, url: string): Promise<void>;
  remoteUpdate(workTree: string, timeoutSeconds: number): Promise<CommandResult>;
  pruneRemote(workTree: string): Promise<void>;
  listBranches(workTree: string): Promise<string[]>;
  fetchRef(workTree: string, url: string, ref: string): Promise<FetchRefResult>;
  checkout(workTree: string, ref: string): Promise<void>;
  resetHard(workTree: string, ref: string): Promise<void>;
  clean(workTree: string): Promise<boolean>;
  headSha(workTree: string): Promise<string>;
  isClean(workTree: string): Promise<boolean>;
}
