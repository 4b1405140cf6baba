/**
 * Ledger store contract shared by the file and db engines.
 */

import type { BackendClass, Backend, Execution, ExecutionStatus, Task, TaskStatus, Tier } from "../../types.js";

export const SCHEMA_VERSION = "1";

export interface CreateTaskInput {
  /** Generated when omitted */
  id?: string;
  parentId?: string | null;
  title: string;
  description?: string;
  tier: Tier;
  status?: TaskStatus;
  workerBackend?: Backend | null;
  contextPath?: string | null;
}

export interface CreateExecutionInput {
  taskId: string;
  workerId: string;
  backend: Backend;
  inputHash?: string | null;
  output: string;
  tokensUsed: number;
  costUSD: number;
  durationMs: number;
  status: ExecutionStatus;
  errorMsg?: string | null;
}

export interface ListTasksOptions {
  /** Default 50 */
  limit?: number;
  status?: TaskStatus;
}

export interface UpdateTaskStatusOptions {
  workerBackend?: Backend;
}

export interface BackendClassStats {
  executions: number;
  costUSD: number;
}

export interface LedgerStats {
  totalTasks: number;
  /** Tasks not yet done or failed */
  pendingTasks: number;
  completedTasks: number;
  failedTasks: number;
  totalExecutions: number;
  byClass: Record<BackendClass, BackendClassStats>;
  estimatedSavingsUSD: number;
  savingsPercent: number;
}

export interface LedgerStoreOptions {
  /** Assumed cost of one task on the most expensive backend class */
  assumedCostPerTaskUSD?: number;
}

export interface LedgerStore {
  createTask(input: CreateTaskInput): Promise<Task>;
  getTask(id: string): Promise<Task | undefined>;
  listTasks(options?: ListTasksOptions): Promise<Task[]>;
  /** Forward-only; throws TaskNotFoundError or InvalidStatusTransitionError. */
  updateTaskStatus(id: string, status: TaskStatus, options?: UpdateTaskStatusOptions): Promise<Task>;
  createExecution(input: CreateExecutionInput): Promise<Execution>;
  listExecutions(taskId: string): Promise<Execution[]>;
  getStats(): Promise<LedgerStats>;
  getMetadata(key: string): Promise<string | undefined>;
  close(): Promise<void>;
}

export const DEFAULT_LIST_LIMIT = 50;
export const DEFAULT_ASSUMED_COST_PER_TASK_USD = 0.05;
