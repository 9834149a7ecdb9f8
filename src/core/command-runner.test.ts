import { describe, expect, it } from "vitest";

import { combinedOutput, createExecaCommandRunner, describeCommand, TIMEOUT_EXIT_CODE } from "./command-runner.js";
import { CommandSpawnError } from "./errors.js";

const NODE = process.execPath;

describe("createExecaCommandRunner", () => {
  const runner = createExecaCommandRunner();

  it("captures output and exit code without throwing", async () => {
    const result = await runner.run(NODE, [
      "-e",
      "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: "out", stderr: "err", timedOut: false });
  });

  it("passes extra environment variables", async () => {
    const result = await runner.run(NODE, ["-e", "process.stdout.write(process.env.GATE_RE_EXEC ?? '')"], {
      env: { GATE_RE_EXEC: "true" },
    });

    expect(result.stdout).toBe("true");
  });

  it("still captures output it streams to the console", async () => {
    const result = await runner.run(NODE, ["-e", "process.stdout.write('handed off')"], {
      streamOutput: true,
    });

    expect(result).toEqual({ exitCode: 0, stdout: "handed off", stderr: "", timedOut: false });
  });

  it("reports a timeout with the timeout exit code", async () => {
    const result = await runner.run(NODE, ["-e", "setTimeout(() => {}, 10000)"], { timeoutSeconds: 0.2 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
  });

  it("throws only when the command cannot be started", async () => {
    await expect(runner.run("gate-no-such-command", [])).rejects.toBeInstanceOf(CommandSpawnError);
  });
});

describe("command helpers", () => {
  it("describes commands and joins output", () => {
    expect(describeCommand("git", ["remote", "update"])).toBe("git remote update");
    expect(combinedOutput({ exitCode: 1, stdout: "", stderr: "fatal", timedOut: false })).toBe("fatal");
    expect(combinedOutput({ exitCode: 0, stdout: "a", stderr: "b", timedOut: false })).toBe("a\nb");
  });
});
