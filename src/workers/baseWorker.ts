/**
 * Base worker: a one-slot busy flag. acquire() checks and sets the flag in one
 * synchronous step, so two runs cannot both claim the same handle.
 */

import { WorkerBusyError } from "../errors.js";
import type { Backend } from "../types.js";
import type { ExecutionResult, Worker, WorkerLease, WorkerTask } from "./types.js";

export abstract class BaseWorker implements Worker {
  private busy = false;
  private disabledFor: string | undefined;

  constructor(
    readonly id: string,
    readonly backend: Backend
  ) {}

  /** Backend-specific execution. Throw for transport/process failures. */
  protected abstract run(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult>;

  abstract checkQuota(signal?: AbortSignal): Promise<void>;

  available(): boolean {
    return !this.busy && this.disabledFor == null;
  }

  acquire(): WorkerLease | undefined {
    if (!this.available()) return undefined;
    this.busy = true;
    let released = false;
    return {
      worker: this,
      execute: (task, signal) => this.run(task, signal),
      release: () => {
        if (released) return;
        released = true;
        this.busy = false;
      },
    };
  }

  async execute(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult> {
    if (this.disabledFor != null) {
      throw new Error(`Worker ${this.backend} is disabled: ${this.disabledFor}`);
    }
    const lease = this.acquire();
    if (!lease) throw new WorkerBusyError(this.backend);
    try {
      return await lease.execute(task, signal);
    } finally {
      lease.release();
    }
  }

  disable(reason: string): void {
    this.disabledFor = reason;
  }

  disabledReason(): string | undefined {
    return this.disabledFor;
  }
}
