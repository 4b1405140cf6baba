import { describe, it, expect, vi, beforeEach } from "vitest";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      _error: unknown,
      message: string | undefined,
      _headers: unknown
    ) {
      super(message);
    }
  }
  class Anthropic {
    static APIError = APIError;
    messages = { create };
  }
  return { default: Anthropic, APIError };
});

import Anthropic from "@anthropic-ai/sdk";
import { AnthropicWorker } from "../anthropicWorker.js";
import { QuotaExceededError } from "../../errors.js";
import type { WorkerTask } from "../types.js";

const TASK: WorkerTask = {
  id: "t1",
  title: "Add OAuth login",
  description: "",
  tier: "standard",
  backend: "claude:sonnet",
};

function makeWorker(): AnthropicWorker {
  return new AnthropicWorker("claude-sonnet-worker", {
    apiKey: "test-secret",
    model: "claude-sonnet-test",
    backend: "claude:sonnet",
    maxTokens: 1024,
    timeoutMs: 1000,
  });
}

beforeEach(() => {
  create.mockReset();
});

describe("AnthropicWorker", () => {
  it("requires an API key", () => {
    expect(
      () =>
        new AnthropicWorker("w", { apiKey: " ", model: "m", backend: "claude:haiku", maxTokens: 1, timeoutMs: 1 })
    ).toThrow("ANTHROPIC_API_KEY is required");
  });

  it("returns text output with usage-based cost", async () => {
    create.mockResolvedValue({
      content: [{ type: "text", text: "Here is the change." }],
      usage: { input_tokens: 1000, output_tokens: 1000 },
    });

    const result = await makeWorker().execute(TASK);

    expect(result.success).toBe(true);
    expect(result.output).toBe("Here is the change.");
    expect(result.tokensUsed).toBe(2000);
    expect(result.costUSD).toBeCloseTo(0.018, 10);
    expect(create.mock.calls[0]?.[0]).toMatchObject({ model: "claude-sonnet-test", max_tokens: 1024 });
  });

  it("reports an error status from the API as a business failure", async () => {
    create.mockRejectedValue(new Anthropic.APIError(500, undefined, "overloaded", undefined));

    const result = await makeWorker().execute(TASK);

    expect(result).toMatchObject({ success: false, error: "claude:sonnet returned status 500: overloaded" });
  });

  it("rethrows transport failures", async () => {
    create.mockRejectedValue(new Error("socket hang up"));
    const worker = makeWorker();
    await expect(worker.execute(TASK)).rejects.toThrow("socket hang up");
    expect(worker.available()).toBe(true);
  });

  it("turns credit errors in the quota check into QuotaExceededError", async () => {
    create.mockRejectedValue(new Anthropic.APIError(400, undefined, "Your credit balance is too low", undefined));
    await expect(makeWorker().checkQuota()).rejects.toBeInstanceOf(QuotaExceededError);
  });

  it("reports other quota check failures as plain errors", async () => {
    create.mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));
    const failure = makeWorker().checkQuota();
    await expect(failure).rejects.toThrow("quota check failed: getaddrinfo ENOTFOUND");
    await expect(failure).rejects.not.toBeInstanceOf(QuotaExceededError);
  });
});
