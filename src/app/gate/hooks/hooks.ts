/**
 * Pre-test, gate and post-test hooks.
 * Purpose: run the project-specific verification commands once the workspaces are ready.
 * Assumptions: hooks are shell snippets; their combined output is kept under the logs dir.
 * Usage: await runGateHooks(config.hooks, { runner, cwd, logsDir, env, events, say }).
 */

import path from "node:path";

import type { HooksConfig } from "../../../core/config.js";
import { combinedOutput, type CommandRunner } from "../../../core/command-runner.js";
import { ConfigError, HookError, type GateError } from "../../../core/errors.js";
import { logGateEvent, type GateEventSink } from "../../../core/logger.js";
import { truncateOutput, writeTextFile } from "../../../core/utils.js";
import { fail, ok, type Result } from "../types.js";

// =============================================================================
// TYPES
// =============================================================================

export type HookName = "pre_test" | "gate" | "post_test";

export type HookContext = {
  runner: CommandRunner;
  cwd: string;
  logsDir: string;
  env: Record<string, string>;
  events: GateEventSink;
  say: (line: string) => void;
  timeoutSeconds?: number;
};

export type HookRunSummary = {
  exitCode: number;
  ran: HookName[];
};

const OUTPUT_PREVIEW_LIMIT = 2000;

// =============================================================================
// PUBLIC API
// =============================================================================

export function hookLogPath(logsDir: string, hook: HookName): string {
  return path.join(logsDir, `${hook.replace("_", "-")}-hook.txt`);
}

export async function runHook(hook: HookName, command: string, ctx: HookContext): Promise<number> {
  logGateEvent(ctx.events, "hook.start", { payload: { hook, command } });

  const res = await ctx.runner.run("sh", ["-c", command], {
    cwd: ctx.cwd,
    env: ctx.env,
    timeoutSeconds: ctx.timeoutSeconds,
  });

  const output = combinedOutput(res);
  await writeTextFile(hookLogPath(ctx.logsDir, hook), output.length > 0 ? `${output}\n` : "");

  const preview = truncateOutput(output, OUTPUT_PREVIEW_LIMIT);
  logGateEvent(ctx.events, "hook.complete", {
    payload: {
      hook,
      exit_code: res.exitCode,
      timed_out: res.timedOut,
      output: preview.text,
      output_truncated: preview.truncated,
    },
  });
  ctx.say(`${hook} hook exited with ${res.exitCode}`);

  return res.exitCode;
}

/**
 * The pre-test hook's status is informational; the gate hook decides the run, and the
 * post-test hook only runs (and then decides) when the gate hook passed.
 */
export async function runGateHooks(
  hooks: HooksConfig,
  ctx: HookContext,
): Promise<Result<HookRunSummary, GateError>> {
  if (!hooks.gate) {
    return fail(new ConfigError("No gate hook configured (hooks.gate)."));
  }

  const ran: HookName[] = [];
  const ctxWithTimeout = { ...ctx, timeoutSeconds: ctx.timeoutSeconds ?? hooks.timeout_seconds };

  if (hooks.pre_test) {
    await runHook("pre_test", hooks.pre_test, ctxWithTimeout);
    ran.push("pre_test");
  }

  let exitCode = await runHook("gate", hooks.gate, ctxWithTimeout);
  ran.push("gate");

  if (exitCode === 0 && hooks.post_test) {
    exitCode = await runHook("post_test", hooks.post_test, ctxWithTimeout);
    ran.push("post_test");
  }

  return ok({ exitCode, ran });
}

export function hookFailure(summary: HookRunSummary): HookError | null {
  if (summary.exitCode === 0) return null;
  const last = summary.ran[summary.ran.length - 1] ?? "gate";
  return new HookError(`${last} hook failed with exit code ${summary.exitCode}`, last, summary.exitCode);
}
