/**
 * File-backed LedgerStore: one JSON document (ledger.json) under the data dir.
 * Every mutation rewrites the document atomically (temp file + rename); writes
 * go through a per-instance queue so concurrent runs never interleave.
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { BackendSchema } from "../../config/schema.js";
import { InvalidStatusTransitionError, LedgerIntegrityError, TaskNotFoundError } from "../../errors.js";
import { canTransition } from "../../taskStatus.js";
import { tierFromIndex, tierIndex } from "../../tierPolicy.js";
import { TASK_STATUSES } from "../../types.js";
import type { Execution, Task, TaskStatus } from "../../types.js";
import { SerialQueue } from "../../utils/serialQueue.js";
import { addExecution, buildStats, emptyClassStats } from "./stats.js";
import {
  DEFAULT_ASSUMED_COST_PER_TASK_USD,
  DEFAULT_LIST_LIMIT,
  SCHEMA_VERSION,
} from "./types.js";
import type {
  CreateExecutionInput,
  CreateTaskInput,
  LedgerStats,
  LedgerStore,
  LedgerStoreOptions,
  ListTasksOptions,
  UpdateTaskStatusOptions,
} from "./types.js";

export const LEDGER_FILENAME = "ledger.json";

const TaskRecordSchema = z.object({
  id: z.string().min(1),
  parentId: z.string().nullable(),
  title: z.string(),
  description: z.string(),
  tier: z.number().int().min(0).max(4),
  status: z.enum(TASK_STATUSES),
  workerBackend: BackendSchema.nullable(),
  contextPath: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const ExecutionRecordSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().min(1),
  workerId: z.string(),
  backend: BackendSchema,
  inputHash: z.string().nullable(),
  output: z.string(),
  tokensUsed: z.number().int().nonnegative(),
  costUSD: z.number().nonnegative(),
  durationMs: z.number().nonnegative(),
  status: z.enum(["completed", "failed"]),
  errorMsg: z.string().nullable(),
  createdAt: z.string(),
});

const ValidationRecordSchema = z.object({
  id: z.string().min(1),
  executionId: z.string().min(1),
  validatorId: z.string(),
  backend: BackendSchema,
  verdict: z.enum(["approve", "reject"]),
  findings: z.string().nullable(),
  createdAt: z.string(),
});

const LedgerDocumentSchema = z.object({
  metadata: z.record(z.string()),
  tasks: z.array(TaskRecordSchema),
  executions: z.array(ExecutionRecordSchema),
  validations: z.array(ValidationRecordSchema).default([]),
});

type TaskRecord = z.infer<typeof TaskRecordSchema>;
type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

function toTask(r: TaskRecord): Task {
  return { ...r, tier: tierFromIndex(r.tier) };
}

function emptyDocument(): LedgerDocument {
  return { metadata: {}, tasks: [], executions: [], validations: [] };
}

export class FileLedgerStore implements LedgerStore {
  readonly path: string;
  private readonly assumedCostPerTaskUSD: number;
  private readonly queue = new SerialQueue();
  private doc: LedgerDocument = emptyDocument();

  private constructor(dataDir: string, options: LedgerStoreOptions) {
    this.path = join(dataDir, LEDGER_FILENAME);
    this.assumedCostPerTaskUSD = options.assumedCostPerTaskUSD ?? DEFAULT_ASSUMED_COST_PER_TASK_USD;
  }

  /** Load (or create) the ledger under dataDir and stamp the schema version. */
  static async open(dataDir: string, options: LedgerStoreOptions = {}): Promise<FileLedgerStore> {
    const store = new FileLedgerStore(dataDir, options);
    await mkdir(dataDir, { recursive: true });
    store.doc = await store.load();
    if (store.doc.metadata.schema_version !== SCHEMA_VERSION) {
      store.doc.metadata.schema_version = SCHEMA_VERSION;
      await store.queue.run(() => store.persist());
    }
    return store;
  }

  private async load(): Promise<LedgerDocument> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return emptyDocument();
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new LedgerIntegrityError(`${this.path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    const result = LedgerDocumentSchema.safeParse(parsed);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new LedgerIntegrityError(
        `${this.path} failed validation: ${first ? `${first.path.join(".")}: ${first.message}` : result.error.message}`
      );
    }
    return result.data;
  }

  private async persist(): Promise<void> {
    const tmp = `${this.path}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tmp, JSON.stringify(this.doc, null, 2), "utf-8");
    await rename(tmp, this.path);
  }

  /** Apply a mutation and persist; the in-memory document is restored if the write fails. */
  private mutate<T>(fn: (doc: LedgerDocument) => T): Promise<T> {
    return this.queue.run(async () => {
      const snapshot = structuredClone(this.doc);
      try {
        const result = fn(this.doc);
        await this.persist();
        return result;
      } catch (e) {
        this.doc = snapshot;
        throw e;
      }
    });
  }

  createTask(input: CreateTaskInput): Promise<Task> {
    return this.mutate((doc) => {
      const id = input.id ?? randomUUID();
      if (doc.tasks.some((t) => t.id === id)) {
        throw new LedgerIntegrityError(`Task ${id} already exists`);
      }
      const parentId = input.parentId ?? null;
      if (parentId != null && !doc.tasks.some((t) => t.id === parentId)) {
        throw new LedgerIntegrityError(`Parent task ${parentId} does not exist`);
      }
      const now = new Date().toISOString();
      const record: TaskRecord = {
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
      };
      doc.tasks.push(record);
      return toTask(record);
    });
  }

  async getTask(id: string): Promise<Task | undefined> {
    const record = this.doc.tasks.find((t) => t.id === id);
    return record ? toTask(record) : undefined;
  }

  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    return this.doc.tasks
      .filter((t) => options.status == null || t.status === options.status)
      .map((t, i) => ({ t, i }))
      .sort((a, b) => b.t.createdAt.localeCompare(a.t.createdAt) || b.i - a.i)
      .slice(0, limit)
      .map(({ t }) => toTask(t));
  }

  updateTaskStatus(id: string, status: TaskStatus, options: UpdateTaskStatusOptions = {}): Promise<Task> {
    return this.mutate((doc) => {
      const record = doc.tasks.find((t) => t.id === id);
      if (!record) throw new TaskNotFoundError(id);
      if (!canTransition(record.status, status)) {
        throw new InvalidStatusTransitionError(id, record.status, status);
      }
      record.status = status;
      if (options.workerBackend) record.workerBackend = options.workerBackend;
      record.updatedAt = new Date().toISOString();
      return toTask(record);
    });
  }

  createExecution(input: CreateExecutionInput): Promise<Execution> {
    return this.mutate((doc) => {
      if (!doc.tasks.some((t) => t.id === input.taskId)) {
        throw new LedgerIntegrityError(`Execution references missing task ${input.taskId}`);
      }
      const execution: Execution = {
        id: randomUUID(),
        taskId: input.taskId,
        workerId: input.workerId,
        backend: input.backend,
        inputHash: input.inputHash ?? null,
        output: input.output,
        tokensUsed: input.tokensUsed,
        costUSD: input.costUSD,
        durationMs: input.durationMs,
        status: input.status,
        errorMsg: input.errorMsg ?? null,
        createdAt: new Date().toISOString(),
      };
      doc.executions.push(execution);
      return { ...execution };
    });
  }

  async listExecutions(taskId: string): Promise<Execution[]> {
    return this.doc.executions.filter((e) => e.taskId === taskId).map((e) => ({ ...e }));
  }

  async getStats(): Promise<LedgerStats> {
    const statusCounts: Partial<Record<TaskStatus, number>> = {};
    for (const t of this.doc.tasks) {
      statusCounts[t.status] = (statusCounts[t.status] ?? 0) + 1;
    }
    const byClass = emptyClassStats();
    for (const e of this.doc.executions) {
      addExecution(byClass, e.backend, 1, e.costUSD);
    }
    return buildStats(statusCounts, byClass, this.assumedCostPerTaskUSD);
  }

  async getMetadata(key: string): Promise<string | undefined> {
    return this.doc.metadata[key];
  }

  /** Waits for queued writes. */
  async close(): Promise<void> {
    await this.queue.idle();
  }
}
