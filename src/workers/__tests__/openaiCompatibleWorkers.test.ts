import { describe, it, expect, vi, beforeEach } from "vitest";

const { create, list, ctor } = vi.hoisted(() => ({ create: vi.fn(), list: vi.fn(), ctor: vi.fn() }));

vi.mock("openai", () => {
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
  class OpenAI {
    static APIError = APIError;
    chat = { completions: { create } };
    models = { list };
    constructor(options: unknown) {
      ctor(options);
    }
  }
  return { default: OpenAI, APIError };
});

import OpenAI from "openai";
import { GeminiWorker } from "../geminiWorker.js";
import { LocalWorker } from "../localWorker.js";
import { QuotaExceededError } from "../../errors.js";
import type { WorkerTask } from "../types.js";

const TASK: WorkerTask = {
  id: "t1",
  title: "Fix typo in README",
  description: "",
  tier: "trivial",
  backend: "ollama:fast",
};

beforeEach(() => {
  create.mockReset();
  list.mockReset();
  ctor.mockReset();
});

describe("LocalWorker", () => {
  function makeWorker(endpoint = "http://localhost:11434/"): LocalWorker {
    return new LocalWorker("ollama-fast-worker", {
      endpoint,
      model: "phi3:mini",
      backend: "ollama:fast",
      timeoutMs: 1000,
    });
  }

  it("talks to the server's OpenAI-compatible path", () => {
    makeWorker();
    expect(ctor).toHaveBeenCalledWith(expect.objectContaining({ baseURL: "http://localhost:11434/v1" }));
  });

  it("is free and counts reported tokens", async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: "Fixed." } }],
      usage: { prompt_tokens: 120, completion_tokens: 30 },
    });

    const result = await makeWorker().execute(TASK);

    expect(result).toMatchObject({ success: true, output: "Fixed.", tokensUsed: 150, costUSD: 0 });
    expect(create.mock.calls[0]?.[0]).toMatchObject({ model: "phi3:mini" });
  });

  it("reports a server error status as a business failure", async () => {
    create.mockRejectedValue(new OpenAI.APIError(404, undefined, "model not found", undefined));
    const result = await makeWorker().execute(TASK);
    expect(result).toMatchObject({ success: false, error: "ollama:fast returned status 404: model not found" });
  });

  it("probes the endpoint in its quota check", async () => {
    list.mockResolvedValue({ data: [] });
    await makeWorker().checkQuota();
    expect(list).toHaveBeenCalledTimes(1);
  });
});

describe("GeminiWorker", () => {
  function makeWorker(): GeminiWorker {
    return new GeminiWorker("gemini-flash-worker", {
      apiKey: "test-secret",
      baseUrl: "https://example.test/openai/",
      model: "gemini-test",
      backend: "gemini:flash",
      timeoutMs: 1000,
    });
  }

  it("prices reported usage", async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: "ok" } }],
      usage: { prompt_tokens: 1000, completion_tokens: 1000 },
    });

    const result = await makeWorker().execute({ ...TASK, backend: "gemini:flash" });

    expect(result.tokensUsed).toBe(2000);
    expect(result.costUSD).toBeCloseTo(0.0005, 10);
  });

  it("estimates tokens when usage is missing", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: "12345678" } }] });

    const result = await makeWorker().execute({ ...TASK, backend: "gemini:flash" });

    expect(result.success).toBe(true);
    expect(result.output).toBe("12345678");
    expect(result.tokensUsed).toBeGreaterThan(2);
  });

  it("disables on a 429 during the quota check", async () => {
    create.mockRejectedValue(new OpenAI.APIError(429, undefined, "Resource has been exhausted", undefined));
    await expect(makeWorker().checkQuota()).rejects.toBeInstanceOf(QuotaExceededError);
  });
});
