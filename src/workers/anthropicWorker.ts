/**
 * Hosted tier A worker using the Anthropic Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import { BaseWorker } from "./baseWorker.js";
import { buildTaskPrompt, looksLikeQuotaError } from "./prompt.js";
import { computeCostUSD } from "./pricing.js";
import { QuotaExceededError, errorMessage } from "../errors.js";
import type { Backend } from "../types.js";
import type { ExecutionResult, WorkerTask } from "./types.js";

export interface AnthropicWorkerConfig {
  apiKey: string;
  model: string;
  backend: Backend;
  maxTokens: number;
  timeoutMs: number;
}

const QUOTA_CHECK_TIMEOUT_MS = 10_000;

export class AnthropicWorker extends BaseWorker {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(id: string, config: AnthropicWorkerConfig) {
    super(id, config.backend);
    if (!config.apiKey || config.apiKey.trim() === "") {
      throw new Error("ANTHROPIC_API_KEY is required for AnthropicWorker. Set it in your environment.");
    }
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  protected async run(task: WorkerTask, signal?: AbortSignal): Promise<ExecutionResult> {
    const start = Date.now();
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: 0.2,
          messages: [{ role: "user", content: buildTaskPrompt(task) }],
        },
        { signal }
      );

      const output = response.content
        .filter((block) => block.type === "text")
        .map((block) => ("text" in block ? block.text : ""))
        .join("");
      const input = response.usage.input_tokens;
      const outputTokens = response.usage.output_tokens;

      return {
        success: true,
        output,
        tokensUsed: input + outputTokens,
        costUSD: computeCostUSD(this.backend, { input, output: outputTokens }),
        durationMs: Date.now() - start,
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError && error.status !== undefined) {
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

  /** Minimal one-token request; credit/quota/billing errors disable the backend. */
  async checkQuota(signal?: AbortSignal): Promise<void> {
    const timeout = AbortSignal.timeout(QUOTA_CHECK_TIMEOUT_MS);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    try {
      await this.client.messages.create(
        { model: this.model, max_tokens: 1, messages: [{ role: "user", content: "hi" }] },
        { signal: combined }
      );
    } catch (error) {
      const message = errorMessage(error);
      const status = error instanceof Anthropic.APIError ? error.status : undefined;
      if (status === 402 || status === 429 || looksLikeQuotaError(message)) {
        throw new QuotaExceededError(this.backend, `quota exceeded or payment required: ${message}`);
      }
      throw new Error(`quota check failed: ${message}`);
    }
  }
}
