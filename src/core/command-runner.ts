/**
 * Command executor for every external program the gate runs (git, hooks).
 * Purpose: one place that owns timeouts and the graceful-then-forced kill.
 * Assumptions: callers inspect exitCode; only a failure to spawn throws.
 * Usage: createExecaCommandRunner().run("git", ["remote", "update"], { cwd, timeoutSeconds: 300 }).
 */

import { execa } from "execa";

import { CommandSpawnError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type RunCommandOptions = {
  cwd?: string;
  timeoutSeconds?: number;
  env?: Record<string, string>;
  // Echo output to this process's stdout and stderr while still capturing it.
  streamOutput?: boolean;
};

export interface CommandRunner {
  run(command: string, args: string[], options?: RunCommandOptions): Promise<CommandResult>;
}

// =============================================================================
// CONSTANTS
// =============================================================================

// SIGTERM first; SIGKILL if the process is still alive after this window.
export const KILL_GRACE_SECONDS = 60;

// Same status timeout(1) reports, so logs read the same as the shell tooling.
export const TIMEOUT_EXIT_CODE = 124;

// =============================================================================
// EXECA RUNNER
// =============================================================================

export function createExecaCommandRunner(): CommandRunner {
  return {
    async run(command, args, options = {}) {
      const res = await execa(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdin: "ignore",
        stdout: options.streamOutput ? ["pipe", "inherit"] : "pipe",
        stderr: options.streamOutput ? ["pipe", "inherit"] : "pipe",
        reject: false,
        timeout: options.timeoutSeconds ? options.timeoutSeconds * 1000 : undefined,
        killSignal: "SIGTERM",
        forceKillAfterDelay: KILL_GRACE_SECONDS * 1000,
      });

      const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
      const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");

      if (res.timedOut) {
        return { exitCode: TIMEOUT_EXIT_CODE, stdout, stderr, timedOut: true };
      }

      if (res.failed && res.exitCode === undefined && !res.isTerminated) {
        throw new CommandSpawnError(
          `Unable to start ${command}${options.cwd ? ` (cwd=${options.cwd})` : ""}: ${stderr || "spawn failed"}`,
          command,
          res,
        );
      }

      return { exitCode: res.exitCode ?? 1, stdout, stderr, timedOut: false };
    },
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export function combinedOutput(result: CommandResult): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join("\n");
}
