/**
 * Zod schemas for the config file and tier policy overrides.
 * Every field has a default, so an empty object parses to the default config.
 */

import { z } from "zod";
import { BACKENDS, TIERS } from "../types.js";

export const TierSchema = z.enum(TIERS);
export const BackendSchema = z.enum(BACKENDS);

const TierConfigObject = z.object({
  primaryBackend: BackendSchema,
  validatorBackend: BackendSchema.nullable(),
  validatorCount: z.number().int().nonnegative(),
  requiredApprovals: z.number().int().nonnegative(),
});

export const TierConfigSchema = TierConfigObject.superRefine((cfg, ctx) => {
  if (cfg.requiredApprovals > cfg.validatorCount) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "requiredApprovals cannot exceed validatorCount",
      path: ["requiredApprovals"],
    });
  }
  if (cfg.validatorCount > 0 && cfg.validatorBackend == null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "validatorBackend is required when validatorCount > 0",
      path: ["validatorBackend"],
    });
  }
});

export const TierTableSchema = z.object({
  trivial: TierConfigSchema,
  simple: TierConfigSchema,
  standard: TierConfigSchema,
  complex: TierConfigSchema,
  critical: TierConfigSchema,
});

export const FallbackGroupSchema = z.object({
  tiers: z.array(TierSchema).min(1),
  backends: z.array(BackendSchema),
});

/** Each tier must belong to exactly one fallback group. */
export const FallbackGroupsSchema = z.array(FallbackGroupSchema).superRefine((groups, ctx) => {
  const seen = new Map<string, number>();
  for (const group of groups) {
    for (const tier of group.tiers) {
      seen.set(tier, (seen.get(tier) ?? 0) + 1);
    }
  }
  for (const tier of TIERS) {
    const n = seen.get(tier) ?? 0;
    if (n !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `tier ${tier} must appear in exactly one fallback group (found ${n})`,
      });
    }
  }
});

const TierOverride = TierConfigObject.partial();

export const PolicyOverridesSchema = z.object({
  tiers: z
    .object({
      trivial: TierOverride.optional(),
      simple: TierOverride.optional(),
      standard: TierOverride.optional(),
      complex: TierOverride.optional(),
      critical: TierOverride.optional(),
    })
    .optional(),
  fallbackGroups: FallbackGroupsSchema.optional(),
});

export type PolicyOverrides = z.infer<typeof PolicyOverridesSchema>;

const LocalWorkersSchema = z.object({
  enabled: z.boolean().default(true),
  endpoint: z.string().url().default("http://localhost:11434"),
  models: z
    .object({
      fast: z.string().default("phi3:mini"),
      default: z.string().default("qwen3:8b"),
      reasoning: z.string().default("qwen3:14b"),
    })
    .default({}),
  timeoutMs: z.number().int().positive().default(300_000),
});

const AnthropicWorkersSchema = z.object({
  enabled: z.boolean().default(true),
  apiKey: z.string().optional(),
  models: z
    .object({
      haiku: z.string().default("claude-3-5-haiku-20241022"),
      sonnet: z.string().default("claude-sonnet-4-5-20250929"),
      opus: z.string().default("claude-opus-4-1-20250805"),
    })
    .default({}),
  maxTokens: z.number().int().positive().default(4096),
  timeoutMs: z.number().int().positive().default(600_000),
});

const GeminiWorkersSchema = z.object({
  enabled: z.boolean().default(false),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  models: z
    .object({
      flash: z.string().default("gemini-2.0-flash"),
      pro: z.string().default("gemini-1.5-pro"),
    })
    .default({}),
  timeoutMs: z.number().int().positive().default(300_000),
});

export const AppConfigSchema = z.object({
  workers: z
    .object({
      local: LocalWorkersSchema.default({}),
      anthropic: AnthropicWorkersSchema.default({}),
      gemini: GeminiWorkersSchema.default({}),
    })
    .default({}),
  policy: PolicyOverridesSchema.default({}),
  ledger: z
    .object({
      driver: z.enum(["file", "db"]).optional(),
      dataDir: z.string().optional(),
    })
    .default({}),
  runLog: z
    .object({
      path: z.string().optional(),
    })
    .default({}),
  savings: z
    .object({
      /** Assumed cost of one task on the most expensive backend class */
      assumedCostPerTaskUSD: z.number().nonnegative().default(0.05),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
