/**
 * Tier policy: tier → backend table, fallback groups and classifier signals.
 * Built once at startup, deep-frozen, and passed by reference; routing changes
 * are edits to this data (or to the config file's `policy` section).
 */

import { DEFAULT_FILE_CUES, DEFAULT_LINE_CUES, DEFAULT_TIER_PATTERNS } from "./classifierPatterns.js";
import { ConfigError } from "./errors.js";
import { FallbackGroupsSchema, PolicyOverridesSchema, TierTableSchema } from "./config/schema.js";
import type { PolicyOverrides } from "./config/schema.js";
import { TIERS } from "./types.js";
import type { Backend, BackendClass, FallbackGroup, Tier, TierConfig, TierPolicy } from "./types.js";

export const DEFAULT_TIER_CONFIGS: Record<Tier, TierConfig> = {
  trivial: {
    primaryBackend: "ollama:fast",
    validatorBackend: null,
    validatorCount: 0,
    requiredApprovals: 0,
  },
  simple: {
    primaryBackend: "ollama:default",
    validatorBackend: "ollama:default",
    validatorCount: 1,
    requiredApprovals: 1,
  },
  standard: {
    primaryBackend: "claude:sonnet",
    validatorBackend: "claude:sonnet",
    validatorCount: 2,
    requiredApprovals: 2,
  },
  complex: {
    primaryBackend: "claude:sonnet",
    validatorBackend: "claude:sonnet",
    validatorCount: 3,
    requiredApprovals: 2,
  },
  critical: {
    primaryBackend: "claude:opus",
    validatorBackend: "claude:sonnet",
    validatorCount: 5,
    requiredApprovals: 4,
  },
};

/**
 * Cheap tiers may degrade to a low-cost hosted backend; complex and critical
 * work only falls back among the two most capable hosted backends.
 */
export const DEFAULT_FALLBACK_GROUPS: FallbackGroup[] = [
  { tiers: ["trivial", "simple"], backends: ["ollama:default", "ollama:fast", "claude:haiku"] },
  { tiers: ["standard"], backends: ["claude:sonnet", "ollama:reasoning", "claude:haiku"] },
  { tiers: ["complex", "critical"], backends: ["claude:opus", "claude:sonnet"] },
];

function freezeGroups(groups: FallbackGroup[]): readonly FallbackGroup[] {
  return Object.freeze(
    groups.map((g) => Object.freeze({ tiers: Object.freeze([...g.tiers]), backends: Object.freeze([...g.backends]) }))
  );
}

function formatIssues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Build an immutable policy from the defaults plus optional overrides.
 * Throws ConfigError when the merged table or fallback groups are invalid.
 */
export function createTierPolicy(overrides?: PolicyOverrides): TierPolicy {
  const parsedOverrides = PolicyOverridesSchema.safeParse(overrides ?? {});
  if (!parsedOverrides.success) {
    throw new ConfigError(`Invalid policy overrides: ${formatIssues(parsedOverrides.error)}`);
  }
  const tierOverrides = parsedOverrides.data.tiers ?? {};

  const merged: Record<Tier, TierConfig> = {
    trivial: { ...DEFAULT_TIER_CONFIGS.trivial, ...tierOverrides.trivial },
    simple: { ...DEFAULT_TIER_CONFIGS.simple, ...tierOverrides.simple },
    standard: { ...DEFAULT_TIER_CONFIGS.standard, ...tierOverrides.standard },
    complex: { ...DEFAULT_TIER_CONFIGS.complex, ...tierOverrides.complex },
    critical: { ...DEFAULT_TIER_CONFIGS.critical, ...tierOverrides.critical },
  };
  const table = TierTableSchema.safeParse(merged);
  if (!table.success) {
    throw new ConfigError(`Invalid tier table: ${formatIssues(table.error)}`);
  }
  const groups = FallbackGroupsSchema.safeParse(parsedOverrides.data.fallbackGroups ?? DEFAULT_FALLBACK_GROUPS);
  if (!groups.success) {
    throw new ConfigError(`Invalid fallback groups: ${formatIssues(groups.error)}`);
  }

  const tiers = Object.freeze({
    trivial: Object.freeze({ ...table.data.trivial }),
    simple: Object.freeze({ ...table.data.simple }),
    standard: Object.freeze({ ...table.data.standard }),
    complex: Object.freeze({ ...table.data.complex }),
    critical: Object.freeze({ ...table.data.critical }),
  });
  const patterns = Object.freeze({
    trivial: Object.freeze(DEFAULT_TIER_PATTERNS.trivial.map((p) => Object.freeze({ ...p }))),
    simple: Object.freeze(DEFAULT_TIER_PATTERNS.simple.map((p) => Object.freeze({ ...p }))),
    standard: Object.freeze(DEFAULT_TIER_PATTERNS.standard.map((p) => Object.freeze({ ...p }))),
    complex: Object.freeze(DEFAULT_TIER_PATTERNS.complex.map((p) => Object.freeze({ ...p }))),
    critical: Object.freeze(DEFAULT_TIER_PATTERNS.critical.map((p) => Object.freeze({ ...p }))),
  });

  return Object.freeze({
    tiers,
    fallbackGroups: freezeGroups(groups.data),
    patterns,
    scope: Object.freeze({ lines: DEFAULT_LINE_CUES, files: DEFAULT_FILE_CUES }),
  });
}

export function getTierConfig(policy: TierPolicy, tier: Tier): Readonly<TierConfig> {
  return policy.tiers[tier];
}

export function tierIndex(tier: Tier): number {
  return TIERS.indexOf(tier);
}

/** Persisted integer → tier; out-of-range values fall back to standard. */
export function tierFromIndex(index: number): Tier {
  return TIERS[index] ?? "standard";
}

export function tierName(tier: Tier): string {
  return tier.toUpperCase();
}

export function maxTier(a: Tier, b: Tier): Tier {
  return tierIndex(a) >= tierIndex(b) ? a : b;
}

export function minTier(a: Tier, b: Tier): Tier {
  return tierIndex(a) <= tierIndex(b) ? a : b;
}

export function parseTier(value: string): Tier | undefined {
  const v = value.trim().toLowerCase();
  return TIERS.find((t) => t === v);
}

/** Fallback list of the group containing `tier` (empty if none). */
export function fallbackBackendsFor(policy: TierPolicy, tier: Tier): readonly Backend[] {
  return policy.fallbackGroups.find((g) => g.tiers.includes(tier))?.backends ?? [];
}

export function backendClass(backend: Backend): BackendClass {
  if (backend.startsWith("ollama:")) return "local";
  if (backend.startsWith("gemini:")) return "gemini";
  return "anthropic";
}
