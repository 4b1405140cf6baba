/**
 * Worker abstraction: one handle per backend identity.
 */

import type { Backend, Tier } from "../types.js";

/** What a backend receives for one execution */
export interface WorkerTask {
  id: string;
  title: string;
  description: string;
  tier: Tier;
  backend: Backend;
}

/** What a backend reports. success=false is a business failure, not a throw. */
export interface ExecutionResult {
  success: boolean;
  output: string;
  tokensUsed: number;
  costUSD: number;
  durationMs: number;
  error?: string;
}

/**
 * Exclusive claim on a free worker. Obtained atomically through acquire();
 * runs one execution and must be released.
 */
export interface WorkerLease {
  readonly worker: Worker;
  execute(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult>;
  release(): void;
}

export interface Worker {
  readonly id: string;
  readonly backend: Backend;
  /** False while an execution is in flight, or after the worker was disabled */
  available(): boolean;
  /** Claim the worker if it is free; undefined otherwise */
  acquire(): WorkerLease | undefined;
  /** Acquire, execute, release. Throws WorkerBusyError if the worker is taken. */
  execute(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult>;
  /** Pre-flight probe; rejects with QuotaExceededError on quota/payment failures */
  checkQuota(signal?: AbortSignal): Promise<void>;
  disable(reason: string): void;
  disabledReason(): string | undefined;
}
