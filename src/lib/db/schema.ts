/**
 * Drizzle schema for the task ledger.
 * Tables: tasks, executions, validations (reserved for the validation protocol), metadata.
 */

import { pgTable, text, timestamp, integer, real, index } from "drizzle-orm/pg-core";
import type { AnyPgColumn } from "drizzle-orm/pg-core";

/** Tasks. tier is the persisted integer 0 (trivial) .. 4 (critical). */
export const tasks = pgTable(
  "tasks",
  {
    id: text("id").primaryKey(),
    parentId: text("parent_id").references((): AnyPgColumn => tasks.id),
    title: text("title").notNull(),
    description: text("description").notNull().default(""),
    tier: integer("tier").notNull(),
    status: text("status").notNull(),
    workerBackend: text("worker_backend"),
    contextPath: text("context_path"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (t) => [index("tasks_status_idx").on(t.status), index("tasks_created_at_idx").on(t.createdAt)]
);

/** Execution attempts. Only successful attempts are written by the conductor. */
export const executions = pgTable(
  "executions",
  {
    id: text("id").primaryKey(),
    taskId: text("task_id")
      .notNull()
      .references(() => tasks.id),
    workerId: text("worker_id").notNull(),
    backend: text("backend").notNull(),
    inputHash: text("input_hash"),
    output: text("output").notNull().default(""),
    tokensUsed: integer("tokens_used").notNull().default(0),
    costUsd: real("cost_usd").notNull().default(0),
    durationMs: integer("duration_ms").notNull().default(0),
    status: text("status").notNull(),
    errorMsg: text("error_msg"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (t) => [index("executions_task_id_idx").on(t.taskId), index("executions_backend_idx").on(t.backend)]
);

/** Validator verdicts. Schema only; nothing writes here yet. */
export const validations = pgTable("validations", {
  id: text("id").primaryKey(),
  executionId: text("execution_id")
    .notNull()
    .references(() => executions.id),
  validatorId: text("validator_id").notNull(),
  backend: text("backend").notNull(),
  verdict: text("verdict").notNull(),
  findings: text("findings"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});

/** Key/value metadata (schema_version). */
export const metadata = pgTable("metadata", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});
