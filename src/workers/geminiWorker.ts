/**
 * Hosted tier B worker: Gemini through Google's OpenAI-compatible endpoint.
 */

import OpenAI from "openai";
import { BaseWorker } from "./baseWorker.js";
import { buildTaskPrompt, looksLikeQuotaError } from "./prompt.js";
import { computeCostUSD, estimateTokens } from "./pricing.js";
import { QuotaExceededError, errorMessage } from "../errors.js";
import type { Backend } from "../types.js";
import type { ExecutionResult, WorkerTask } from "./types.js";

export interface GeminiWorkerConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  backend: Backend;
  timeoutMs: number;
}

const QUOTA_CHECK_TIMEOUT_MS = 10_000;

export class GeminiWorker extends BaseWorker {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(id: string, config: GeminiWorkerConfig) {
    super(id, config.backend);
    if (!config.apiKey || config.apiKey.trim() === "") {
      throw new Error("GEMINI_API_KEY is required for GeminiWorker. Set it in your environment.");
    }
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
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
      const input = response.usage?.prompt_tokens ?? estimateTokens(prompt.length);
      const outputTokens = response.usage?.completion_tokens ?? estimateTokens(output.length);
      return {
        success: true,
        output,
        tokensUsed: input + outputTokens,
        costUSD: computeCostUSD(this.backend, { input, output: outputTokens }),
        durationMs: Date.now() - start,
      };
    } catch (error) {
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

  async checkQuota(signal?: AbortSignal): Promise<void> {
    const timeout = AbortSignal.timeout(QUOTA_CHECK_TIMEOUT_MS);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    try {
      await this.client.chat.completions.create(
        { model: this.model, max_tokens: 1, messages: [{ role: "user", content: "hi" }] },
        { signal: combined }
      );
    } catch (error) {
      const message = errorMessage(error);
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      if (status === 402 || status === 429 || looksLikeQuotaError(message)) {
        throw new QuotaExceededError(this.backend, `quota exceeded or payment required: ${message}`);
      }
      throw new Error(`quota check failed: ${message}`);
    }
  }
}
