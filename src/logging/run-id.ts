/**
 * Run IDs tie log entries and persisted model metadata to one execution.
 */

import { randomBytes } from "node:crypto";

let currentRunId: string | null = null;

/**
 * Short run ID: UTC date plus a random suffix, e.g. "20240115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

/** Start a new run. Replaces any previous run ID. */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

export function getRunId(): string | null {
  return currentRunId;
}

/** Current run ID, starting a run if none is active. */
export function ensureRunId(): string {
  return currentRunId ?? initRunId();
}
