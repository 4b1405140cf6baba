/**
 * DB-backed LedgerStore. Used when PERSISTENCE_DRIVER=db.
 * Apply drizzle/*.sql first (scripts/db/migrate.ts).
 */

import { randomUUID } from "crypto";
import { asc, count, desc, eq, sum } from "drizzle-orm";
import { BackendSchema } from "../../config/schema.js";
import { InvalidStatusTransitionError, LedgerIntegrityError, TaskNotFoundError } from "../../errors.js";
import { canTransition } from "../../taskStatus.js";
import { tierFromIndex, tierIndex } from "../../tierPolicy.js";
import { TASK_STATUSES } from "../../types.js";
import type { Backend, Execution, Task, TaskStatus } from "../../types.js";
import { SerialQueue } from "../../utils/serialQueue.js";
import { closeDb } from "../db/index.js";
import type { Db } from "../db/index.js";
import { executions, metadata, tasks } from "../db/schema.js";
import { addExecution, buildStats, emptyClassStats } from "./stats.js";
import { DEFAULT_ASSUMED_COST_PER_TASK_USD, DEFAULT_LIST_LIMIT, SCHEMA_VERSION } from "./types.js";
import type {
  CreateExecutionInput,
  CreateTaskInput,
  LedgerStats,
  LedgerStore,
  LedgerStoreOptions,
  ListTasksOptions,
  UpdateTaskStatusOptions,
} from "./types.js";

type TaskRow = typeof tasks.$inferSelect;
type ExecutionRow = typeof executions.$inferSelect;

function parseStatus(value: string): TaskStatus {
  const status = TASK_STATUSES.find((s) => s === value);
  if (!status) throw new LedgerIntegrityError(`Unknown task status in database: ${value}`);
  return status;
}

function parseBackend(value: string): Backend {
  const result = BackendSchema.safeParse(value);
  if (!result.success) throw new LedgerIntegrityError(`Unknown backend in database: ${value}`);
  return result.data;
}

function rowToTask(r: TaskRow): Task {
  return {
    id: r.id,
    parentId: r.parentId,
    title: r.title,
    description: r.description,
    tier: tierFromIndex(r.tier),
    status: parseStatus(r.status),
    workerBackend: r.workerBackend != null ? parseBackend(r.workerBackend) : null,
    contextPath: r.contextPath,
    createdAt: r.createdAt.toISOString(),
    updatedAt: r.updatedAt.toISOString(),
  };
}

function rowToExecution(r: ExecutionRow): Execution {
  return {
    id: r.id,
    taskId: r.taskId,
    workerId: r.workerId,
    backend: parseBackend(r.backend),
    inputHash: r.inputHash,
    output: r.output,
    tokensUsed: r.tokensUsed,
    costUSD: r.costUsd,
    durationMs: r.durationMs,
    status: r.status === "completed" ? "completed" : "failed",
    errorMsg: r.errorMsg,
    createdAt: r.createdAt.toISOString(),
  };
}

export class DbLedgerStore implements LedgerStore {
  private readonly queue = new SerialQueue();
  private readonly assumedCostPerTaskUSD: number;

  private constructor(
    private readonly db: Db,
    options: LedgerStoreOptions
  ) {
    this.assumedCostPerTaskUSD = options.assumedCostPerTaskUSD ?? DEFAULT_ASSUMED_COST_PER_TASK_USD;
  }

  /** Stamps metadata.schema_version on open. */
  static async open(db: Db, options: LedgerStoreOptions = {}): Promise<DbLedgerStore> {
    const store = new DbLedgerStore(db, options);
    await db
      .insert(metadata)
      .values({ key: "schema_version", value: SCHEMA_VERSION, updatedAt: new Date() })
      .onConflictDoUpdate({ target: metadata.key, set: { value: SCHEMA_VERSION, updatedAt: new Date() } });
    return store;
  }

  private async findTaskRow(id: string): Promise<TaskRow | undefined> {
    const rows = await this.db.select().from(tasks).where(eq(tasks.id, id)).limit(1);
    return rows[0];
  }

  createTask(input: CreateTaskInput): Promise<Task> {
    return this.queue.run(async () => {
      const id = input.id ?? randomUUID();
      if (await this.findTaskRow(id)) {
        throw new LedgerIntegrityError(`Task ${id} already exists`);
      }
      const parentId = input.parentId ?? null;
      if (parentId != null && !(await this.findTaskRow(parentId))) {
        throw new LedgerIntegrityError(`Parent task ${parentId} does not exist`);
      }
      const now = new Date();
      const rows = await this.db
        .insert(tasks)
        .values({
          id,
          parentId,
          title: input.title,
          description: input.description ?? "",
          tier: tierIndex(input.tier),
          status: input.status ?? "pending",
          workerBackend: input.workerBackend ?? null,
          contextPath: input.contextPath ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .returning();
      const row = rows[0];
      if (!row) throw new LedgerIntegrityError(`Insert of task ${id} returned no row`);
      return rowToTask(row);
    });
  }

  async getTask(id: string): Promise<Task | undefined> {
    const row = await this.findTaskRow(id);
    return row ? rowToTask(row) : undefined;
  }

  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    const rows = await this.db
      .select()
      .from(tasks)
      .where(options.status ? eq(tasks.status, options.status) : undefined)
      .orderBy(desc(tasks.createdAt))
      .limit(limit);
    return rows.map(rowToTask);
  }

  updateTaskStatus(id: string, status: TaskStatus, options: UpdateTaskStatusOptions = {}): Promise<Task> {
    return this.queue.run(async () => {
      const row = await this.findTaskRow(id);
      if (!row) throw new TaskNotFoundError(id);
      const current = parseStatus(row.status);
      if (!canTransition(current, status)) {
        throw new InvalidStatusTransitionError(id, current, status);
      }
      const rows = await this.db
        .update(tasks)
        .set({
          status,
          updatedAt: new Date(),
          ...(options.workerBackend ? { workerBackend: options.workerBackend } : {}),
        })
        .where(eq(tasks.id, id))
        .returning();
      const updated = rows[0];
      if (!updated) throw new TaskNotFoundError(id);
      return rowToTask(updated);
    });
  }

  createExecution(input: CreateExecutionInput): Promise<Execution> {
    return this.queue.run(async () => {
      if (!(await this.findTaskRow(input.taskId))) {
        throw new LedgerIntegrityError(`Execution references missing task ${input.taskId}`);
      }
      const rows = await this.db
        .insert(executions)
        .values({
          id: randomUUID(),
          taskId: input.taskId,
          workerId: input.workerId,
          backend: input.backend,
          inputHash: input.inputHash ?? null,
          output: input.output,
          tokensUsed: input.tokensUsed,
          costUsd: input.costUSD,
          durationMs: Math.round(input.durationMs),
          status: input.status,
          errorMsg: input.errorMsg ?? null,
          createdAt: new Date(),
        })
        .returning();
      const row = rows[0];
      if (!row) throw new LedgerIntegrityError(`Insert of execution for task ${input.taskId} returned no row`);
      return rowToExecution(row);
    });
  }

  async listExecutions(taskId: string): Promise<Execution[]> {
    const rows = await this.db
      .select()
      .from(executions)
      .where(eq(executions.taskId, taskId))
      .orderBy(asc(executions.createdAt));
    return rows.map(rowToExecution);
  }

  async getStats(): Promise<LedgerStats> {
    const statusRows = await this.db
      .select({ status: tasks.status, n: count() })
      .from(tasks)
      .groupBy(tasks.status);
    const statusCounts: Partial<Record<TaskStatus, number>> = {};
    for (const r of statusRows) {
      statusCounts[parseStatus(r.status)] = r.n;
    }

    const backendRows = await this.db
      .select({ backend: executions.backend, n: count(), cost: sum(executions.costUsd) })
      .from(executions)
      .groupBy(executions.backend);
    const byClass = emptyClassStats();
    for (const r of backendRows) {
      addExecution(byClass, parseBackend(r.backend), r.n, Number(r.cost ?? 0));
    }
    return buildStats(statusCounts, byClass, this.assumedCostPerTaskUSD);
  }

  async getMetadata(key: string): Promise<string | undefined> {
    const rows = await this.db.select().from(metadata).where(eq(metadata.key, key)).limit(1);
    return rows[0]?.value;
  }

  async close(): Promise<void> {
    await this.queue.idle();
    await closeDb();
  }
}
