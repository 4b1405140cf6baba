import { describe, it, expect } from "vitest";
import { computeCostUSD, estimateTokens } from "../pricing.js";
import { buildTaskPrompt, looksLikeQuotaError } from "../prompt.js";

describe("pricing", () => {
  it("prices hosted backends per 1k tokens", () => {
    expect(computeCostUSD("claude:sonnet", { input: 1000, output: 2000 })).toBeCloseTo(0.033, 10);
    expect(computeCostUSD("claude:opus", { input: 2000, output: 1000 })).toBeCloseTo(0.105, 10);
    expect(computeCostUSD("gemini:flash", { input: 1000, output: 1000 })).toBeCloseTo(0.0005, 10);
  });

  it("charges nothing for local backends", () => {
    expect(computeCostUSD("ollama:reasoning", { input: 50_000, output: 50_000 })).toBe(0);
  });

  it("estimates four characters per token", () => {
    expect(estimateTokens(10)).toBe(2);
    expect(estimateTokens(3)).toBe(0);
  });
});

describe("buildTaskPrompt", () => {
  it("omits the details section for a blank description", () => {
    const prompt = buildTaskPrompt({ id: "t", title: "Fix it", description: "  ", tier: "simple", backend: "ollama:default" });
    expect(prompt.startsWith("You are an expert software engineer. Complete the following task:\n\n## Task\nFix it\n\n## Instructions\n")).toBe(true);
    expect(prompt.endsWith("## Response\n")).toBe(true);
  });

  it("includes the trimmed description", () => {
    const prompt = buildTaskPrompt({ id: "t", title: "Fix it", description: " in parser.ts \n", tier: "simple", backend: "ollama:default" });
    expect(prompt).toContain("## Details\nin parser.ts\n\n");
  });
});

describe("looksLikeQuotaError", () => {
  it("recognizes quota and billing messages", () => {
    expect(looksLikeQuotaError("Your credit balance is too low")).toBe(true);
    expect(looksLikeQuotaError("429 Too Many Requests")).toBe(true);
    expect(looksLikeQuotaError("RESOURCE EXHAUSTED")).toBe(true);
  });

  it("ignores unrelated failures", () => {
    expect(looksLikeQuotaError("connect ECONNREFUSED 127.0.0.1:11434")).toBe(false);
  });
});
