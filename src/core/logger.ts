import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  project?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  project?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  project?: string;
};

type LogFailureAction = "write" | "close";

// Narrow surface the gate components log through, so tests can collect events in memory.
export interface GateEventSink {
  log(event: LogEventInput): void;
}

export interface ClosableEventSink extends GateEventSink {
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements ClosableEventSink {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly debug = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.debug));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.debug));
    }
  }
}

export class MemoryEventSink implements ClosableEventSink {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = { runId: "memory" }) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }

  close(): void {}
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, project, payload, ts, type } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type, run_id: runId };

  const resolvedProject = project ?? defaults.project;
  if (resolvedProject) {
    result.project = resolvedProject;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logGateEvent(
  sink: GateEventSink,
  type: string,
  fields: { project?: string; payload?: JsonObject } = {},
): void {
  const event: LogEventInput = { type };
  if (fields.project !== undefined) event.project = fields.project;
  if (fields.payload !== undefined) event.payload = fields.payload;
  sink.log(event);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  debug: boolean,
): string {
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${formatErrorMessage(error)}`;
  if (!debug) return message;

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
