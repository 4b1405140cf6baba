/**
 * In-memory LedgerStore for tests. No filesystem or network.
 */

import { randomUUID } from "crypto";
import { InvalidStatusTransitionError, LedgerIntegrityError, TaskNotFoundError } from "../../../errors.js";
import { canTransition } from "../../../taskStatus.js";
import type { Execution, Task, TaskStatus } from "../../../types.js";
import { addExecution, buildStats, emptyClassStats } from "../stats.js";
import { DEFAULT_ASSUMED_COST_PER_TASK_USD, DEFAULT_LIST_LIMIT, SCHEMA_VERSION } from "../types.js";
import type {
  CreateExecutionInput,
  CreateTaskInput,
  LedgerStats,
  LedgerStore,
  ListTasksOptions,
  UpdateTaskStatusOptions,
} from "../types.js";

export class InMemoryLedgerStore implements LedgerStore {
  readonly tasks: Task[] = [];
  readonly executions: Execution[] = [];
  /** Status transitions applied, in order */
  readonly history: { taskId: string; status: TaskStatus }[] = [];
  /** When set, updateTaskStatus to this status throws */
  failOnStatus: TaskStatus | undefined;

  async createTask(input: CreateTaskInput): Promise<Task> {
    const id = input.id ?? randomUUID();
    if (this.tasks.some((t) => t.id === id)) throw new LedgerIntegrityError(`Task ${id} already exists`);
    const parentId = input.parentId ?? null;
    if (parentId != null && !this.tasks.some((t) => t.id === parentId)) {
      throw new LedgerIntegrityError(`Parent task ${parentId} does not exist`);
    }
    const now = new Date().toISOString();
    const task: Task = {
      id,
      parentId,
      title: input.title,
      description: input.description ?? "",
      tier: input.tier,
      status: input.status ?? "pending",
      workerBackend: input.workerBackend ?? null,
      contextPath: input.contextPath ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.push(task);
    return { ...task };
  }

  async getTask(id: string): Promise<Task | undefined> {
    const task = this.tasks.find((t) => t.id === id);
    return task ? { ...task } : undefined;
  }

  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    return this.tasks
      .filter((t) => options.status == null || t.status === options.status)
      .reverse()
      .slice(0, options.limit ?? DEFAULT_LIST_LIMIT)
      .map((t) => ({ ...t }));
  }

  async updateTaskStatus(id: string, status: TaskStatus, options: UpdateTaskStatusOptions = {}): Promise<Task> {
    if (this.failOnStatus === status) throw new Error(`ledger unavailable (${status})`);
    const task = this.tasks.find((t) => t.id === id);
    if (!task) throw new TaskNotFoundError(id);
    if (!canTransition(task.status, status)) throw new InvalidStatusTransitionError(id, task.status, status);
    task.status = status;
    if (options.workerBackend) task.workerBackend = options.workerBackend;
    task.updatedAt = new Date().toISOString();
    this.history.push({ taskId: id, status });
    return { ...task };
  }

  async createExecution(input: CreateExecutionInput): Promise<Execution> {
    if (!this.tasks.some((t) => t.id === input.taskId)) {
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
    this.executions.push(execution);
    return { ...execution };
  }

  async listExecutions(taskId: string): Promise<Execution[]> {
    return this.executions.filter((e) => e.taskId === taskId).map((e) => ({ ...e }));
  }

  async getStats(): Promise<LedgerStats> {
    const counts: Partial<Record<TaskStatus, number>> = {};
    for (const t of this.tasks) counts[t.status] = (counts[t.status] ?? 0) + 1;
    const byClass = emptyClassStats();
    for (const e of this.executions) addExecution(byClass, e.backend, 1, e.costUSD);
    return buildStats(counts, byClass, DEFAULT_ASSUMED_COST_PER_TASK_USD);
  }

  async getMetadata(key: string): Promise<string | undefined> {
    return key === "schema_version" ? SCHEMA_VERSION : undefined;
  }

  async close(): Promise<void> {}
}
