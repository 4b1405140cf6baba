/**
 * Error types. Business outcomes (no worker, backend failure) are reported in
 * RunResult; these are thrown for configuration, persistence and quota faults.
 */

import type { Backend, TaskStatus } from "./types.js";

export class ConfigError extends Error {
  readonly code = "config_invalid";
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TaskNotFoundError extends Error {
  readonly code = "task_not_found";
  constructor(readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

export class InvalidStatusTransitionError extends Error {
  readonly code = "invalid_status_transition";
  constructor(
    readonly taskId: string,
    readonly from: TaskStatus,
    readonly to: TaskStatus
  ) {
    super(`Task ${taskId}: cannot move from ${from} to ${to}`);
    this.name = "InvalidStatusTransitionError";
  }
}

export class LedgerIntegrityError extends Error {
  readonly code = "ledger_integrity";
  constructor(message: string) {
    super(message);
    this.name = "LedgerIntegrityError";
  }
}

/** Pre-flight failure that disables a backend for the rest of the process. */
export class QuotaExceededError extends Error {
  readonly code = "quota_exceeded";
  constructor(
    readonly backend: Backend,
    message: string
  ) {
    super(message);
    this.name = "QuotaExceededError";
  }
}

export class WorkerBusyError extends Error {
  readonly code = "worker_busy";
  constructor(readonly backend: Backend) {
    super(`Worker ${backend} is busy`);
    this.name = "WorkerBusyError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
