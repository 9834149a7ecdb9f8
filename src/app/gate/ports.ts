/**
 * Gate ports define the boundary between the gate flow and the host.
 * Purpose: keep waiting and randomness injectable so retry paths run instantly in tests.
 * Assumptions: production uses real timers and Math.random.
 * Usage: systemPause and mathRandom in production; scripted fakes in tests.
 */

import { setTimeout as delay } from "node:timers/promises";

import type { GateVcs } from "./vcs/vcs.js";
import type { GateEventSink } from "../../core/logger.js";

export interface Pause {
  sleep(ms: number): Promise<void>;
}

export interface RandomSource {
  // Uniform in [0, 1).
  next(): number;
}

export type GatePorts = {
  vcs: GateVcs;
  events: GateEventSink;
  pause: Pause;
  random: RandomSource;
  // Operator-facing progress lines.
  say: (line: string) => void;
};

export const systemPause: Pause = {
  sleep: (ms) => delay(ms),
};

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};
