/**
 * Task classifier: weighted pattern scoring per tier, then a scope-based clamp.
 * Pure and deterministic; never throws.
 */

import { getTierConfig, maxTier, minTier, tierName } from "./tierPolicy.js";
import { TIERS } from "./types.js";
import type { ClassificationResult, ScopeCueTable, Tier, TierPolicy } from "./types.js";

const DEFAULT_TIER: Tier = "standard";
const BASE_CONFIDENCE = 0.5;
const CONFIDENCE_PER_POINT = 0.15;
const MAX_CONFIDENCE = 0.95;

export interface TierScore {
  tier: Tier;
  score: number;
  patterns: string[];
}

/** Value of the first cue (in table order) with a phrase present in `text`. */
export function estimateFromCues(text: string, table: ScopeCueTable): number {
  for (const cue of table.cues) {
    if (cue.phrases.some((p) => text.includes(p))) return cue.value;
  }
  return table.defaultValue;
}

/**
 * Clamp a tier by scope: large scope raises it to a floor, tiny scope lowers it
 * to a ceiling. Never moves a tier past those bounds.
 */
export function adjustTierByScope(tier: Tier, lines: number, files: number): Tier {
  if (lines > 500 || files > 10) {
    return maxTier(tier, "complex");
  }
  if (lines > 200 || files > 5) {
    return maxTier(tier, "standard");
  }
  if (lines < 10 && files === 1) {
    return minTier(tier, "simple");
  }
  return tier;
}

export function confidenceForScore(score: number): number {
  if (score <= 0) return BASE_CONFIDENCE;
  return Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + score * CONFIDENCE_PER_POINT);
}

export class TaskClassifier {
  constructor(private readonly policy: TierPolicy) {}

  /** Score every tier in severity order. */
  scoreTiers(text: string): TierScore[] {
    return TIERS.map((tier) => {
      let score = 0;
      const patterns: string[] = [];
      for (const p of this.policy.patterns[tier]) {
        if (p.regex.test(text)) {
          score += p.weight;
          patterns.push(p.name);
        }
      }
      return { tier, score, patterns };
    });
  }

  classify(title: string, description: string): ClassificationResult {
    const text = `${title} ${description}`.toLowerCase();

    // Strictly-greater comparison in severity order: ties keep the lower tier.
    let winner: TierScore = { tier: DEFAULT_TIER, score: 0, patterns: [] };
    for (const s of this.scoreTiers(text)) {
      if (s.score > winner.score) winner = s;
    }

    const estimatedLines = estimateFromCues(text, this.policy.scope.lines);
    const estimatedFiles = estimateFromCues(text, this.policy.scope.files);
    const tier = adjustTierByScope(winner.tier, estimatedLines, estimatedFiles);

    const result: ClassificationResult = {
      tier,
      confidence: confidenceForScore(winner.score),
      recommendedBackend: getTierConfig(this.policy, tier).primaryBackend,
      reasoning: "",
      patterns: [...winner.patterns],
      estimatedLines,
      estimatedFiles,
    };
    result.reasoning = buildReasoning(result);
    return result;
  }
}

function buildReasoning(result: ClassificationResult): string {
  const parts = [`Tier: ${tierName(result.tier)}`];
  if (result.patterns.length > 0) {
    parts.push(`Matched patterns: ${result.patterns.join(", ")}`);
  }
  parts.push(`Estimated scope: ~${result.estimatedLines} lines across ${result.estimatedFiles} file(s)`);
  return parts.join(". ");
}
