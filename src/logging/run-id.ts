/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID so that log lines from one document
 * render can be grouped together.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: date prefix + random suffix (e.g. "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process. Call once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId() has been called.
 */
export function getRunId(): string | null {
  return currentRunId;
}
