/**
 * Run log: one JSON line per conductor run, appended to the configured file.
 */

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { Backend, Tier } from "./types.js";
import type { RunResult } from "./conductor.js";

export interface RunLogEvent {
  runId: string;
  ts: string;
  taskId: string | null;
  dryRun: boolean;
  routing: {
    tier: Tier;
    confidence: number;
    patterns: string[];
    recommendedBackend: Backend;
    actualBackend: Backend | null;
    fallbackUsed: boolean;
  };
  final: {
    status: RunResult["status"];
    error: string | null;
    validationRequired: boolean;
  };
  execution: {
    tokensUsed: number;
    costUSD: number;
    durationMs: number;
  } | null;
  durationMs: number;
}

export function toRunLogEvent(runId: string, result: RunResult): RunLogEvent {
  const c = result.classification;
  return {
    runId,
    ts: result.finishedAt,
    taskId: result.taskId ?? null,
    dryRun: result.dryRun,
    routing: {
      tier: c.tier,
      confidence: c.confidence,
      patterns: c.patterns,
      recommendedBackend: c.recommendedBackend,
      actualBackend: result.actualBackend ?? null,
      fallbackUsed: result.fallbackUsed,
    },
    final: {
      status: result.status,
      error: result.error ?? null,
      validationRequired: result.validationRequired,
    },
    execution: result.execution
      ? {
          tokensUsed: result.execution.tokensUsed,
          costUSD: result.execution.costUSD,
          durationMs: result.execution.durationMs,
        }
      : null,
    durationMs: result.durationMs,
  };
}

/** Creates the log's directory on first use. */
export async function appendRunLog(path: string, event: RunLogEvent): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n", "utf-8");
}
