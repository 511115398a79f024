/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID so log lines for one document
 * generation or check can be grouped together.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + time + random suffix (e.g., "20240115T093012-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const iso = now.toISOString();
  const datePart = iso.slice(0, 10).replace(/-/g, "");
  const timePart = iso.slice(11, 19).replace(/:/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}T${timePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this execution.
 * Called once by the CLI entry point.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null when running as a library.
 */
export function getRunId(): string | null {
  return currentRunId;
}
