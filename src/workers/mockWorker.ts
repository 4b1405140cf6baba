/**
 * Mock worker for testing and offline runs. Deterministic outputs, optional latency.
 * Trigger behaviors via title/description substrings:
 * - __FAIL__: returns an unsuccessful result
 * - __THROW__: throws, as a transport failure would
 */

import { BaseWorker } from "./baseWorker.js";
import { buildTaskPrompt } from "./prompt.js";
import { computeCostUSD, estimateTokens } from "./pricing.js";
import { QuotaExceededError } from "../errors.js";
import type { Backend } from "../types.js";
import type { ExecutionResult, WorkerTask } from "./types.js";

export interface MockWorkerOptions {
  /** Latency range in ms; 0..0 by default. */
  latencyMs?: { min: number; max: number };
  /** Simulated preflight outcome. */
  quota?: "ok" | "exceeded" | "unreachable";
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class MockWorker extends BaseWorker {
  private readonly options: MockWorkerOptions;

  constructor(id: string, backend: Backend, options: MockWorkerOptions = {}) {
    super(id, backend);
    this.options = options;
  }

  protected async run(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult> {
    const start = Date.now();
    const { min, max } = this.options.latencyMs ?? { min: 0, max: 0 };
    const ms = min + Math.random() * Math.max(0, max - min);
    if (ms > 0 || signal) await delay(ms, signal);

    const text = `${task.title}\n${task.description}`;
    if (text.includes("__THROW__")) {
      throw new Error(`Simulated transport failure on ${this.backend}`);
    }
    if (text.includes("__FAIL__")) {
      return {
        success: false,
        output: "",
        tokensUsed: 0,
        costUSD: 0,
        durationMs: Date.now() - start,
        error: "Forced failure for testing",
      };
    }

    const output = `[${this.backend}] ${task.title}: done.`;
    const input = estimateTokens(buildTaskPrompt(task).length);
    const outputTokens = estimateTokens(output.length);
    return {
      success: true,
      output,
      tokensUsed: input + outputTokens,
      costUSD: computeCostUSD(this.backend, { input, output: outputTokens }),
      durationMs: Date.now() - start,
    };
  }

  async checkQuota(): Promise<void> {
    switch (this.options.quota ?? "ok") {
      case "exceeded":
        throw new QuotaExceededError(this.backend, "mock quota exhausted");
      case "unreachable":
        throw new Error(`mock ${this.backend} unreachable`);
      default:
        return;
    }
  }
}
