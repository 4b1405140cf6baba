/**
 * Aggregate ledger statistics. Both engines reduce to the same inputs.
 */

import { backendClass } from "../../tierPolicy.js";
import { isTerminal } from "../../taskStatus.js";
import { TASK_STATUSES } from "../../types.js";
import type { Backend, BackendClass, TaskStatus } from "../../types.js";
import type { BackendClassStats, LedgerStats } from "./types.js";

export function emptyClassStats(): Record<BackendClass, BackendClassStats> {
  return {
    local: { executions: 0, costUSD: 0 },
    anthropic: { executions: 0, costUSD: 0 },
    gemini: { executions: 0, costUSD: 0 },
  };
}

export function addExecution(
  byClass: Record<BackendClass, BackendClassStats>,
  backend: Backend,
  executions: number,
  costUSD: number
): void {
  const bucket = byClass[backendClass(backend)];
  bucket.executions += executions;
  bucket.costUSD += costUSD;
}

/**
 * Savings versus running everything on the most expensive class:
 * (local + gemini executions) * assumed cost − gemini spend.
 * Percent is savings over (anthropic + gemini spend + savings); 0 when that is not positive.
 */
export function computeSavings(
  byClass: Record<BackendClass, BackendClassStats>,
  assumedCostPerTaskUSD: number
): { estimatedSavingsUSD: number; savingsPercent: number } {
  const cheapExecutions = byClass.local.executions + byClass.gemini.executions;
  const estimatedSavingsUSD = cheapExecutions * assumedCostPerTaskUSD - byClass.gemini.costUSD;
  const denominator = byClass.anthropic.costUSD + byClass.gemini.costUSD + estimatedSavingsUSD;
  const savingsPercent = denominator > 0 ? (estimatedSavingsUSD / denominator) * 100 : 0;
  return { estimatedSavingsUSD, savingsPercent };
}

export function buildStats(
  statusCounts: Partial<Record<TaskStatus, number>>,
  byClass: Record<BackendClass, BackendClassStats>,
  assumedCostPerTaskUSD: number
): LedgerStats {
  let totalTasks = 0;
  let pendingTasks = 0;
  for (const status of TASK_STATUSES) {
    const n = statusCounts[status] ?? 0;
    totalTasks += n;
    if (!isTerminal(status)) pendingTasks += n;
  }
  const totalExecutions = byClass.local.executions + byClass.anthropic.executions + byClass.gemini.executions;
  return {
    totalTasks,
    pendingTasks,
    completedTasks: statusCounts.done ?? 0,
    failedTasks: statusCounts.failed ?? 0,
    totalExecutions,
    byClass,
    ...computeSavings(byClass, assumedCostPerTaskUSD),
  };
}

