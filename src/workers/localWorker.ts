/**
 * Local model worker: an Ollama server through its OpenAI-compatible API.
 * Free to run; cost is always 0.
 */

import OpenAI from "openai";
import { BaseWorker } from "./baseWorker.js";
import { buildTaskPrompt } from "./prompt.js";
import { estimateTokens } from "./pricing.js";
import type { Backend } from "../types.js";
import type { ExecutionResult, WorkerTask } from "./types.js";

export interface LocalWorkerConfig {
  endpoint: string;
  model: string;
  backend: Backend;
  timeoutMs: number;
}

export class LocalWorker extends BaseWorker {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(id: string, config: LocalWorkerConfig) {
    super(id, config.backend);
    this.model = config.model;
    this.client = new OpenAI({
      // Ollama ignores the key but the SDK requires one.
      apiKey: "ollama",
      baseURL: `${config.endpoint.replace(/\/+$/, "")}/v1`,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  protected async run(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult> {
    const start = Date.now();
    const prompt = buildTaskPrompt(task);
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0.2,
        },
        { signal }
      );
      const output = response.choices[0]?.message?.content ?? "";
      const tokensUsed =
        response.usage != null
          ? response.usage.prompt_tokens + response.usage.completion_tokens
          : estimateTokens(prompt.length + output.length);
      return {
        success: true,
        output,
        tokensUsed,
        costUSD: 0,
        durationMs: Date.now() - start,
      };
    } catch (error) {
      // The server answered with an error status: report it; anything else is transport.
      if (error instanceof OpenAI.APIError && error.status !== undefined) {
        return {
          success: false,
          output: "",
          tokensUsed: 0,
          costUSD: 0,
          durationMs: Date.now() - start,
          error: `${this.backend} returned status ${error.status}: ${error.message}`,
        };
      }
      throw error;
    }
  }

  /** No quota locally; verifies the endpoint answers. */
  async checkQuota(signal?: AbortSignal): Promise<void> {
    await this.client.models.list({ signal });
  }
}
