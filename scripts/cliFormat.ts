/**
 * Human-readable summaries for the CLI.
 */

import type { RunResult } from "../src/conductor.js";
import type { LedgerStats } from "../src/lib/ledger/types.js";
import { tierName } from "../src/tierPolicy.js";
import type { Backend, ClassificationResult, TierConfig } from "../src/types.js";

function usd(n: number): string {
  return `$${n.toFixed(4)}`;
}

export function formatClassification(
  c: ClassificationResult,
  tierConfig: TierConfig,
  fallbacks: readonly Backend[]
): string {
  const lines = [
    `Tier:        ${tierName(c.tier)}`,
    `Confidence:  ${(c.confidence * 100).toFixed(0)}%`,
    `Backend:     ${c.recommendedBackend}`,
    `Fallbacks:   ${fallbacks.length > 0 ? fallbacks.join(", ") : "(none)"}`,
    `Validators:  ${tierConfig.validatorCount} (need ${tierConfig.requiredApprovals})`,
    `Patterns:    ${c.patterns.length > 0 ? c.patterns.join(", ") : "(none)"}`,
    `Scope:       ~${c.estimatedLines} lines, ${c.estimatedFiles} file(s)`,
    `Reasoning:   ${c.reasoning}`,
  ];
  return lines.join("\n");
}

export function formatRunResult(r: RunResult): string {
  const lines = [
    `${r.dryRun ? "Dry run" : "Run"}: ${r.status.toUpperCase()}${r.taskId ? ` (task ${r.taskId})` : ""}`,
    `  tier ${tierName(r.classification.tier)}, recommended ${r.classification.recommendedBackend}`,
  ];
  if (r.actualBackend) {
    lines.push(`  backend ${r.actualBackend}${r.fallbackUsed ? " (fallback)" : ""}`);
  }
  if (r.execution) {
    lines.push(
      `  ${r.execution.tokensUsed} tokens, ${usd(r.execution.costUSD)}, ${r.execution.durationMs}ms`
    );
  }
  if (r.validation) {
    lines.push(
      `  validation pending: ${r.validation.requiredApprovals}/${r.validation.validatorCount} approvals on ${r.validation.validatorBackend ?? "?"}`
    );
  }
  if (r.error) lines.push(`  error: ${r.error}`);
  if (r.execution?.output) lines.push("", r.execution.output);
  return lines.join("\n");
}

export function formatStats(s: LedgerStats): string {
  return [
    `Tasks:       ${s.totalTasks} total, ${s.pendingTasks} in progress, ${s.completedTasks} done, ${s.failedTasks} failed`,
    `Executions:  ${s.totalExecutions}`,
    `  local      ${s.byClass.local.executions} runs, ${usd(s.byClass.local.costUSD)}`,
    `  anthropic  ${s.byClass.anthropic.executions} runs, ${usd(s.byClass.anthropic.costUSD)}`,
    `  gemini     ${s.byClass.gemini.executions} runs, ${usd(s.byClass.gemini.costUSD)}`,
    `Savings:     ${usd(s.estimatedSavingsUSD)} (${s.savingsPercent.toFixed(1)}%)`,
  ].join("\n");
}
