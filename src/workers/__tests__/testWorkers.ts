/**
 * Worker doubles for tests.
 */

import { BaseWorker } from "../baseWorker.js";
import type { Backend } from "../../types.js";
import type { ExecutionResult, WorkerTask } from "../types.js";

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Blocks inside execute until open() is called; `started` resolves on entry. */
export class GatedWorker extends BaseWorker {
  readonly calls: WorkerTask[] = [];
  private readonly entered = deferred();
  private readonly gate = deferred();

  constructor(backend: Backend) {
    super(`gated-${backend}`, backend);
  }

  get started(): Promise<void> {
    return this.entered.promise;
  }

  open(): void {
    this.gate.resolve();
  }

  protected async run(task: WorkerTask): Promise<ExecutionResult> {
    this.calls.push(task);
    this.entered.resolve();
    await this.gate.promise;
    return { success: true, output: `gated ${task.title}`, tokensUsed: 10, costUSD: 0, durationMs: 1 };
  }

  async checkQuota(): Promise<void> {}
}
