/**
 * Task lifecycle. Statuses only move forward; re-asserting the current status is allowed.
 */

import type { TaskStatus } from "./types.js";

const NEXT: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["assigned", "working", "failed"],
  assigned: ["working", "failed"],
  working: ["validating", "done", "failed"],
  validating: ["approved", "rejected", "failed"],
  approved: ["done", "failed"],
  rejected: ["failed"],
  done: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to || NEXT[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return status === "done" || status === "failed";
}
