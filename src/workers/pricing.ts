/**
 * Token and cost estimates for hosted backends.
 * Used when a backend does not report usage, and to price reported usage.
 */

import type { Backend } from "../types.js";

export interface EstimatedTokens {
  input: number;
  output: number;
}

export interface PricingSpec {
  inPer1k: number;
  outPer1k: number;
}

/** USD per 1k tokens by backend. Local backends are free. */
export const BACKEND_PRICING: Record<Backend, PricingSpec> = {
  "ollama:fast": { inPer1k: 0, outPer1k: 0 },
  "ollama:default": { inPer1k: 0, outPer1k: 0 },
  "ollama:reasoning": { inPer1k: 0, outPer1k: 0 },
  "claude:haiku": { inPer1k: 0.0008, outPer1k: 0.004 },
  "claude:sonnet": { inPer1k: 0.003, outPer1k: 0.015 },
  "claude:opus": { inPer1k: 0.015, outPer1k: 0.075 },
  "gemini:flash": { inPer1k: 0.0001, outPer1k: 0.0004 },
  "gemini:pro": { inPer1k: 0.00125, outPer1k: 0.005 },
};

const CHARS_PER_TOKEN = 4;

/** Rough estimate: 4 characters per token. */
export function estimateTokens(charCount: number): number {
  return Math.floor(charCount / CHARS_PER_TOKEN);
}

/**
 * Formula: (input/1000)*inPer1k + (output/1000)*outPer1k.
 */
export function computeCostUSD(backend: Backend, tokens: EstimatedTokens): number {
  const pricing = BACKEND_PRICING[backend];
  return (tokens.input / 1000) * pricing.inPer1k + (tokens.output / 1000) * pricing.outPer1k;
}
