import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, MemoryEventSink, eventWithTs, logGateEvent } from "./logger.js";

const tmpDirs: string[] = [];

function tmpLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  tmpDirs.push(tmpDir);
  return path.join(tmpDir, ...segments);
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs.length = 0;
});

describe("JsonlLogger", () => {
  it("writes events with run and project metadata", () => {
    const logPath = tmpLogPath("nested", "gate.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", project: "openstack/nova" });

    logger.log({ type: "workspace.checkout", payload: { ref: "FETCH_HEAD" } });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event?.type).toBe("workspace.checkout");
    expect(event?.run_id).toBe("run-1");
    expect(event?.project).toBe("openstack/nova");
    expect(event?.payload).toEqual({ ref: "FETCH_HEAD" });
    expect(new Date(String(event?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = tmpLogPath("gate.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });

    logGateEvent(logger, "gate.start", { payload: { order: 1 } });
    logGateEvent(logger, "gate.complete", { project: "openstack/glance", payload: { order: 2 } });
    logger.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["gate.start", "gate.complete"]);
    expect(events.map((e) => e.project)).toEqual([undefined, "openstack/glance"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("ignores events after close", () => {
    const logPath = tmpLogPath("gate.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    logger.log({ type: "first" });
    logger.close();
    logger.log({ type: "late" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["first"]);
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = tmpLogPath("gate.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "gate.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const logPath = tmpLogPath("gate.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-5" }, true);

    const writeError = new Error("disk full");
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "gate.start" });
    logger.close();

    const message = warnSpy.mock.calls[0]?.[0];
    expect(message).toContain("disk full");
    if (writeError.stack) {
      expect(message).toContain(writeError.stack);
    }
  });
});

describe("MemoryEventSink", () => {
  it("collects events with the default run id", () => {
    const sink = new MemoryEventSink();

    logGateEvent(sink, "resolve.outcome", { project: "openstack/nova", payload: { kind: "branch-head" } });

    expect(sink.types()).toEqual(["resolve.outcome"]);
    expect(sink.events[0]?.run_id).toBe("memory");
    expect(sink.events[0]?.project).toBe("openstack/nova");
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, project: "openstack/nova" },
      { runId: "run-x" },
    );

    expect(event.run_id).toBe("run-x");
    expect(event.project).toBe("openstack/nova");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
  });

  it("drops empty payloads", () => {
    const event = eventWithTs({ type: "sample", payload: {}, ts: "2024-01-01T00:00:00.000Z" }, { runId: "r" });

    expect(event).toEqual({ ts: "2024-01-01T00:00:00.000Z", type: "sample", run_id: "r" });
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});
