/**
 * Worker factory: builds one handle per enabled backend from the app config.
 * mock=true swaps every backend for a MockWorker.
 */

import { AnthropicWorker } from "./anthropicWorker.js";
import { GeminiWorker } from "./geminiWorker.js";
import { LocalWorker } from "./localWorker.js";
import { MockWorker } from "./mockWorker.js";
import { WorkerRegistry } from "./registry.js";
import { backendClass } from "../tierPolicy.js";
import { BACKENDS } from "../types.js";
import type { AppConfig } from "../config/schema.js";
import type { Backend } from "../types.js";
import type { Worker } from "./types.js";

export { BaseWorker } from "./baseWorker.js";
export { MockWorker } from "./mockWorker.js";
export { WorkerRegistry } from "./registry.js";
export { acquireWorker, candidateBackends, resolveWorker } from "./fallbackResolver.js";
export type { ExecutionResult, Worker, WorkerLease, WorkerTask } from "./types.js";

export interface CreateWorkersOptions {
  mock?: boolean;
}

export function workerId(backend: Backend): string {
  return `${backend.replace(":", "-")}-worker`;
}

function classEnabled(config: AppConfig, backend: Backend): boolean {
  switch (backendClass(backend)) {
    case "local":
      return config.workers.local.enabled;
    case "anthropic":
      return config.workers.anthropic.enabled;
    case "gemini":
      return config.workers.gemini.enabled;
  }
}

export function createWorkers(config: AppConfig, options: CreateWorkersOptions = {}): Worker[] {
  if (options.mock) {
    return BACKENDS.filter((b) => classEnabled(config, b)).map(
      (b) => new MockWorker(workerId(b), b, { latencyMs: { min: 50, max: 150 } })
    );
  }

  const workers: Worker[] = [];
  const { local, anthropic, gemini } = config.workers;

  if (local.enabled) {
    const models: [Backend, string][] = [
      ["ollama:fast", local.models.fast],
      ["ollama:default", local.models.default],
      ["ollama:reasoning", local.models.reasoning],
    ];
    for (const [backend, model] of models) {
      workers.push(
        new LocalWorker(workerId(backend), { endpoint: local.endpoint, model, backend, timeoutMs: local.timeoutMs })
      );
    }
  }

  if (anthropic.enabled) {
    const apiKey = anthropic.apiKey;
    if (apiKey) {
      const models: [Backend, string][] = [
        ["claude:haiku", anthropic.models.haiku],
        ["claude:sonnet", anthropic.models.sonnet],
        ["claude:opus", anthropic.models.opus],
      ];
      for (const [backend, model] of models) {
        workers.push(
          new AnthropicWorker(workerId(backend), {
            apiKey,
            model,
            backend,
            maxTokens: anthropic.maxTokens,
            timeoutMs: anthropic.timeoutMs,
          })
        );
      }
    } else {
      console.warn("[Workers] ANTHROPIC_API_KEY not set; claude backends not registered");
    }
  }

  if (gemini.enabled) {
    const apiKey = gemini.apiKey;
    if (apiKey) {
      const models: [Backend, string][] = [
        ["gemini:flash", gemini.models.flash],
        ["gemini:pro", gemini.models.pro],
      ];
      for (const [backend, model] of models) {
        workers.push(
          new GeminiWorker(workerId(backend), {
            apiKey,
            baseUrl: gemini.baseUrl,
            model,
            backend,
            timeoutMs: gemini.timeoutMs,
          })
        );
      }
    } else {
      console.warn("[Workers] GEMINI_API_KEY not set; gemini backends not registered");
    }
  }

  return workers;
}

export function createRegistry(workers: Worker[]): WorkerRegistry {
  const registry = new WorkerRegistry();
  for (const worker of workers) registry.register(worker);
  return registry;
}
