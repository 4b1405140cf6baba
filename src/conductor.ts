/**
 * Conductor: classify -> persist -> resolve -> execute -> persist -> finalize.
 *
 * Business outcomes (no worker, backend failure, cancellation) come back as a
 * RunResult with status "failed". Ledger errors are thrown to the caller.
 */

import { createHash, randomUUID } from "crypto";
import { TaskClassifier } from "./classifier.js";
import { errorMessage } from "./errors.js";
import type { LedgerStore } from "./lib/ledger/types.js";
import { appendRunLog, toRunLogEvent } from "./runLog.js";
import { getTierConfig, tierName } from "./tierPolicy.js";
import { debugLog } from "./utils/debug.js";
import { acquireWorker, candidateBackends, resolveWorker } from "./workers/fallbackResolver.js";
import { WorkerRegistry } from "./workers/registry.js";
import type { ExecutionResult, Worker, WorkerTask } from "./workers/types.js";
import type { Backend, ClassificationResult, Execution, Tier, TierPolicy } from "./types.js";

export const NO_WORKER_ERROR = "no available worker for this task tier";
export const CANCELLED_ERROR = "run cancelled before execution";

/** Placeholder until the validator quorum is implemented. */
export interface ValidationPlan {
  status: "pending";
  validatorBackend: Backend | null;
  validatorCount: number;
  requiredApprovals: number;
}

/** "preview" only for dry runs that found a worker. */
export type RunStatus = "done" | "validating" | "failed" | "preview";

export interface RunResult {
  /** Absent for dry runs */
  taskId?: string;
  classification: ClassificationResult;
  actualBackend?: Backend;
  fallbackUsed: boolean;
  fallbackBackend?: Backend;
  workerAvailable: boolean;
  /** Persisted execution; present only on success */
  execution?: Execution;
  status: RunStatus;
  error?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  validationRequired: boolean;
  validation?: ValidationPlan;
  dryRun: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Skip classification's tier and route as this tier */
  tier?: Tier;
  parentId?: string;
  contextPath?: string;
}

export interface ConductorOptions {
  policy: TierPolicy;
  ledger: LedgerStore;
  registry?: WorkerRegistry;
  /** JSONL file receiving one line per run */
  runLogPath?: string;
}

export function inputHash(title: string, description: string): string {
  return createHash("sha256").update(title + description).digest("hex");
}

type Outcome = Omit<RunResult, "classification" | "startedAt" | "finishedAt" | "durationMs" | "dryRun">;

export class Conductor {
  readonly policy: TierPolicy;
  readonly registry: WorkerRegistry;
  private readonly ledger: LedgerStore;
  private readonly classifier: TaskClassifier;
  private readonly runLogPath: string | undefined;

  constructor(options: ConductorOptions) {
    this.policy = options.policy;
    this.ledger = options.ledger;
    this.registry = options.registry ?? new WorkerRegistry();
    this.classifier = new TaskClassifier(options.policy);
    this.runLogPath = options.runLogPath;
  }

  registerWorker(worker: Worker): void {
    this.registry.register(worker);
  }

  classify(title: string, description: string): ClassificationResult {
    return this.classifier.classify(title, description);
  }

  private classifyForRun(title: string, description: string, forced?: Tier): ClassificationResult {
    const classification = this.classify(title, description);
    if (!forced || forced === classification.tier) return classification;
    return {
      ...classification,
      tier: forced,
      recommendedBackend: getTierConfig(this.policy, forced).primaryBackend,
      reasoning: `Tier forced to ${tierName(forced)} (classified as ${tierName(classification.tier)}). ${classification.reasoning}`,
    };
  }

  private finish(classification: ClassificationResult, started: Date, dryRun: boolean, outcome: Outcome): RunResult {
    const finished = new Date();
    return {
      ...outcome,
      classification,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      dryRun,
    };
  }

  /**
   * Preview routing: classification plus the worker a run would get. Persists nothing.
   * workerAvailable reports the recommended backend only; a fallback shows up as
   * fallbackBackend.
   */
  dryRun(title: string, description: string, options: Pick<RunOptions, "tier"> = {}): RunResult {
    const started = new Date();
    const classification = this.classifyForRun(title, description, options.tier);
    const primaryAvailable = this.registry.get(classification.recommendedBackend)?.available() ?? false;
    const worker = resolveWorker(classification.tier, this.registry, this.policy);
    const tierConfig = getTierConfig(this.policy, classification.tier);
    const validationRequired = tierConfig.validatorCount > 0;

    if (!worker) {
      return this.finish(classification, started, true, {
        fallbackUsed: false,
        workerAvailable: false,
        status: "failed",
        error: NO_WORKER_ERROR,
        validationRequired,
      });
    }
    const fallbackUsed = worker.backend !== classification.recommendedBackend;
    return this.finish(classification, started, true, {
      actualBackend: worker.backend,
      fallbackUsed,
      fallbackBackend: fallbackUsed ? worker.backend : undefined,
      workerAvailable: primaryAvailable,
      status: "preview",
      validationRequired,
    });
  }

  async run(title: string, description: string, options: RunOptions = {}): Promise<RunResult> {
    const result = await this.execute(title, description, options);
    await this.logRun(result);
    return result;
  }

  private async execute(title: string, description: string, options: RunOptions): Promise<RunResult> {
    const started = new Date();
    const classification = this.classifyForRun(title, description, options.tier);
    const { tier, recommendedBackend } = classification;
    debugLog(`[Conductor] ${title}: ${classification.reasoning}`);

    const task = await this.ledger.createTask({
      parentId: options.parentId ?? null,
      title,
      description,
      tier,
      status: "pending",
      workerBackend: recommendedBackend,
      contextPath: options.contextPath ?? null,
    });

    await this.registry.preflight();

    const lease = acquireWorker(tier, this.registry, this.policy);
    if (!lease) {
      console.warn(
        `[Conductor] Task ${task.id} (${tierName(tier)}): none of ${candidateBackends(tier, this.policy).join(", ")} available`
      );
      return this.finish(classification, started, false, {
        taskId: task.id,
        fallbackUsed: false,
        workerAvailable: false,
        status: "failed",
        error: NO_WORKER_ERROR,
        validationRequired: false,
      });
    }

    try {
      const backend = lease.worker.backend;
      const fallbackUsed = backend !== recommendedBackend;
      const routed = {
        taskId: task.id,
        actualBackend: backend,
        fallbackUsed,
        fallbackBackend: fallbackUsed ? backend : undefined,
        workerAvailable: true,
        validationRequired: false,
      };

      await this.ledger.updateTaskStatus(task.id, "working", { workerBackend: backend });

      if (options.signal?.aborted) {
        await this.ledger.updateTaskStatus(task.id, "failed");
        return this.finish(classification, started, false, { ...routed, status: "failed", error: CANCELLED_ERROR });
      }

      const workerTask: WorkerTask = { id: task.id, title, description, tier, backend };
      let outcome: ExecutionResult;
      try {
        outcome = await lease.execute(workerTask, options.signal);
      } catch (e) {
        const error = errorMessage(e);
        console.warn(`[Conductor] Task ${task.id} on ${backend} failed: ${error}`);
        await this.ledger.updateTaskStatus(task.id, "failed");
        return this.finish(classification, started, false, { ...routed, status: "failed", error });
      }

      if (!outcome.success) {
        const error = outcome.error ?? `${backend} reported failure`;
        await this.ledger.updateTaskStatus(task.id, "failed");
        return this.finish(classification, started, false, { ...routed, status: "failed", error });
      }

      const execution = await this.ledger.createExecution({
        taskId: task.id,
        workerId: lease.worker.id,
        backend,
        inputHash: inputHash(title, description),
        output: outcome.output,
        tokensUsed: outcome.tokensUsed,
        costUSD: outcome.costUSD,
        durationMs: outcome.durationMs,
        status: "completed",
      });

      const tierConfig = getTierConfig(this.policy, tier);
      if (tierConfig.validatorCount > 0) {
        await this.ledger.updateTaskStatus(task.id, "validating");
        return this.finish(classification, started, false, {
          ...routed,
          execution,
          status: "validating",
          validationRequired: true,
          validation: {
            status: "pending",
            validatorBackend: tierConfig.validatorBackend,
            validatorCount: tierConfig.validatorCount,
            requiredApprovals: tierConfig.requiredApprovals,
          },
        });
      }

      await this.ledger.updateTaskStatus(task.id, "done");
      return this.finish(classification, started, false, { ...routed, execution, status: "done" });
    } finally {
      lease.release();
    }
  }

  private async logRun(result: RunResult): Promise<void> {
    if (!this.runLogPath) return;
    try {
      await appendRunLog(this.runLogPath, toRunLogEvent(randomUUID(), result));
    } catch (e) {
      console.warn(`[Conductor] Failed to append run log: ${errorMessage(e)}`);
    }
  }
}
