/**
 * Task Router Types
 * Defines tiers, backends, tasks, classification results and the tier policy shape.
 */

/** Complexity tiers, ordered by severity (index = persisted integer). */
export const TIERS = ["trivial", "simple", "standard", "complex", "critical"] as const;

export type Tier = (typeof TIERS)[number];

/** Execution backends known to the router */
export const BACKENDS = [
  "ollama:fast",
  "ollama:default",
  "ollama:reasoning",
  "claude:haiku",
  "claude:sonnet",
  "claude:opus",
  "gemini:flash",
  "gemini:pro",
] as const;

export type Backend = (typeof BACKENDS)[number];

/** Cost class of a backend, derived from its identity prefix */
export type BackendClass = "local" | "anthropic" | "gemini";

/** Task lifecycle states */
export const TASK_STATUSES = [
  "pending",
  "assigned",
  "working",
  "validating",
  "approved",
  "rejected",
  "done",
  "failed",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Per-tier routing and validation requirements */
export interface TierConfig {
  primaryBackend: Backend;
  validatorBackend: Backend | null;
  validatorCount: number;
  requiredApprovals: number;
}

/** Named classifier pattern with a positive weight */
export interface TierPattern {
  name: string;
  regex: RegExp;
  weight: number;
}

/** Lexical scope cue: first cue (in table order) whose phrase appears wins */
export interface ScopeCue {
  phrases: readonly string[];
  value: number;
}

export interface ScopeCueTable {
  cues: readonly ScopeCue[];
  defaultValue: number;
}

/** Fallback group: tiers sharing one ordered list of alternate backends */
export interface FallbackGroup {
  tiers: readonly Tier[];
  backends: readonly Backend[];
}

/**
 * Immutable routing policy built once at startup and passed by reference
 * into the classifier and conductor.
 */
export interface TierPolicy {
  tiers: Readonly<Record<Tier, Readonly<TierConfig>>>;
  fallbackGroups: readonly FallbackGroup[];
  patterns: Readonly<Record<Tier, readonly TierPattern[]>>;
  scope: {
    lines: ScopeCueTable;
    files: ScopeCueTable;
  };
}

/** Output of the task classifier */
export interface ClassificationResult {
  tier: Tier;
  /** 0..1, a function of the winning score only */
  confidence: number;
  recommendedBackend: Backend;
  reasoning: string;
  /** Matched pattern names of the winning tier */
  patterns: string[];
  estimatedLines: number;
  estimatedFiles: number;
}

/** Persisted task record */
export interface Task {
  id: string;
  parentId: string | null;
  title: string;
  description: string;
  tier: Tier;
  status: TaskStatus;
  workerBackend: Backend | null;
  contextPath: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ExecutionStatus = "completed" | "failed";

/** Persisted execution attempt */
export interface Execution {
  id: string;
  taskId: string;
  workerId: string;
  backend: Backend;
  inputHash: string | null;
  output: string;
  tokensUsed: number;
  costUSD: number;
  durationMs: number;
  status: ExecutionStatus;
  errorMsg: string | null;
  createdAt: string;
}
