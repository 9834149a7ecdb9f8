import {
  combinedOutput,
  describeCommand,
  type CommandResult,
  type CommandRunner,
} from "../core/command-runner.js";
import { GitError } from "../core/errors.js";

import { parseBranchListing } from "./refs.js";

// =============================================================================
// TYPES
// =============================================================================

export type FetchRefResult =
  | { kind: "fetched" }
  | { kind: "not-found"; detail: string }
  | { kind: "unreachable"; detail: string };

// =============================================================================
// CORE
// =============================================================================

const ORIGIN = "origin";

export async function git(
  runner: CommandRunner,
  cwd: string,
  args: string[],
  timeoutSeconds?: number,
): Promise<CommandResult> {
  return runner.run("git", args, { cwd, timeoutSeconds });
}

export async function gitOrThrow(
  runner: CommandRunner,
  cwd: string,
  args: string[],
  timeoutSeconds?: number,
): Promise<CommandResult> {
  const res = await git(runner, cwd, args, timeoutSeconds);
  if (res.exitCode !== 0) {
    throw new GitError(
      `${describeCommand("git", args)} failed (cwd=${cwd}): ${res.stderr.trim() || `exit ${res.exitCode}`}`,
      { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode },
    );
  }
  return res;
}

// =============================================================================
// REMOTES
// =============================================================================

export async function cloneRepo(
  runner: CommandRunner,
  parentDir: string,
  url: string,
  dirName: string,
  timeoutSeconds?: number,
): Promise<void> {
  await gitOrThrow(runner, parentDir, ["clone", url, dirName], timeoutSeconds);
}

export async function setRemoteUrl(
  runner: CommandRunner,
  cwd: string,
  url: string,
  timeoutSeconds?: number,
): Promise<void> {
  await gitOrThrow(runner, cwd, ["remote", "set-url", ORIGIN, url], timeoutSeconds);
}

export async function remoteUpdate(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds: number,
): Promise<CommandResult> {
  return git(runner, cwd, ["remote", "update"], timeoutSeconds);
}

export async function pruneRemote(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds?: number,
): Promise<void> {
  await gitOrThrow(runner, cwd, ["remote", "prune", ORIGIN], timeoutSeconds);
}

export async function listBranches(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds?: number,
): Promise<string[]> {
  const res = await gitOrThrow(runner, cwd, ["branch", "-a"], timeoutSeconds);
  return parseBranchListing(res.stdout);
}

export async function fetchRef(
  runner: CommandRunner,
  cwd: string,
  url: string,
  ref: string,
  timeoutSeconds?: number,
): Promise<FetchRefResult> {
  const res = await git(runner, cwd, ["fetch", url, ref], timeoutSeconds);
  if (res.exitCode === 0) return { kind: "fetched" };

  const detail = combinedOutput(res).trim() || `exit ${res.exitCode}`;
  if (res.timedOut || isNetworkFailure(detail)) {
    return { kind: "unreachable", detail };
  }
  return { kind: "not-found", detail };
}

// =============================================================================
// WORKING TREE
// =============================================================================

export async function checkout(
  runner: CommandRunner,
  cwd: string,
  ref: string,
  timeoutSeconds?: number,
): Promise<void> {
  await gitOrThrow(runner, cwd, ["checkout", ref], timeoutSeconds);
}

export async function resetHard(
  runner: CommandRunner,
  cwd: string,
  ref: string,
  timeoutSeconds?: number,
): Promise<void> {
  await gitOrThrow(runner, cwd, ["reset", "--hard", ref], timeoutSeconds);
}

// Removes untracked and ignored files; false when git reports a failure or times out.
export async function cleanWorkingTree(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds?: number,
): Promise<boolean> {
  const res = await git(runner, cwd, ["clean", "-x", "-f", "-d", "-q"], timeoutSeconds);
  return res.exitCode === 0;
}

export async function headSha(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds?: number,
): Promise<string> {
  const res = await gitOrThrow(runner, cwd, ["rev-parse", "HEAD"], timeoutSeconds);
  return res.stdout.trim();
}

export async function isWorkingTreeClean(
  runner: CommandRunner,
  cwd: string,
  timeoutSeconds?: number,
): Promise<boolean> {
  const res = await gitOrThrow(runner, cwd, ["status", "--porcelain", "--ignored"], timeoutSeconds);
  return res.stdout.trim().length === 0;
}

// =============================================================================
// INTERNALS
// =============================================================================

const NETWORK_FAILURE_PATTERNS = [
  "could not resolve host",
  "unable to access",
  "connection refused",
  "connection timed out",
  "connection reset",
  "operation timed out",
  "could not read from remote repository",
  "the remote end hung up",
  "early eof",
];

function isNetworkFailure(output: string): boolean {
  const lowered = output.toLowerCase();
  return NETWORK_FAILURE_PATTERNS.some((pattern) => lowered.includes(pattern));
}
