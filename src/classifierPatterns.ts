/**
 * Default classifier signals: per-tier weighted patterns and the scope cue tables.
 * Tier lists are evaluated from lowest to highest severity.
 */

import type { ScopeCueTable, Tier, TierPattern } from "./types.js";

export const DEFAULT_TIER_PATTERNS: Record<Tier, TierPattern[]> = {
  // edits, formatting, typos
  trivial: [
    { name: "typo", regex: /\b(typo|spelling|spelt|misspell)/i, weight: 0.9 },
    { name: "format", regex: /\b(format|indent|whitespace|spacing)\b/i, weight: 0.8 },
    { name: "comment", regex: /\b(add|update|fix)\s+(a\s+)?comment/i, weight: 0.8 },
    { name: "rename_local", regex: /\brename\s+(the\s+)?(variable|param|local)/i, weight: 0.7 },
    { name: "simple_string", regex: /\b(change|update)\s+(the\s+)?(string|text|message|label)/i, weight: 0.6 },
    { name: "import", regex: /\b(add|remove|fix)\s+(an?\s+)?import/i, weight: 0.7 },
  ],
  simple: [
    { name: "add_function", regex: /\badd\s+(a\s+)?(simple\s+)?(function|method|helper)/i, weight: 0.7 },
    { name: "fix_bug_obvious", regex: /\bfix\s+(the\s+)?(bug|issue|error|crash)\s+(in|where|when)/i, weight: 0.6 },
    { name: "update_config", regex: /\b(update|change|modify)\s+(the\s+)?config/i, weight: 0.7 },
    { name: "add_field", regex: /\badd\s+(a\s+)?(new\s+)?(field|property|attribute)/i, weight: 0.6 },
    { name: "simple_validation", regex: /\badd\s+(simple\s+)?validation/i, weight: 0.6 },
    { name: "update_constant", regex: /\b(update|change)\s+(the\s+)?(constant|value|default)/i, weight: 0.7 },
  ],
  standard: [
    { name: "new_feature", regex: /\b(implement|create|build|add)\s+(a\s+)?(new\s+)?feature/i, weight: 0.7 },
    { name: "refactor", regex: /\brefactor\b/i, weight: 0.6 },
    { name: "add_tests", regex: /\b(add|write|create)\s+(unit\s+)?tests?/i, weight: 0.6 },
    { name: "api_endpoint", regex: /\b(add|create|implement)\s+(an?\s+)?(api\s+)?endpoint/i, weight: 0.7 },
    { name: "component", regex: /\b(create|build|add)\s+(a\s+)?(new\s+)?component/i, weight: 0.6 },
    { name: "integration", regex: /\bintegrat(e|ion)\b/i, weight: 0.5 },
  ],
  complex: [
    { name: "architecture", regex: /\b(architect|redesign|restructure)/i, weight: 0.8 },
    { name: "migration", regex: /\b(migrat|data\s+migration)/i, weight: 0.8 },
    { name: "cross_cutting", regex: /\b(across|throughout|all)\s+(the\s+)?(codebase|project|system)/i, weight: 0.7 },
    { name: "api_breaking", regex: /\bbreaking\s+change/i, weight: 0.8 },
    { name: "multiple_services", regex: /\bmultiple\s+(service|system|component)s/i, weight: 0.7 },
    { name: "database_schema", regex: /\b(database|db)\s+schema/i, weight: 0.7 },
  ],
  // high-risk changes
  critical: [
    {
      name: "security",
      regex: /\b(security|vulnerab|exploit|injection|xss|csrf|auth(entication|orization)?)\b/i,
      weight: 0.9,
    },
    { name: "payments", regex: /\b(payment|billing|transaction|money|financial)/i, weight: 0.9 },
    { name: "encryption", regex: /\b(encrypt|decrypt|crypto|hash|secret|credential)/i, weight: 0.8 },
    { name: "core_algorithm", regex: /\bcore\s+(algorithm|logic|system)/i, weight: 0.8 },
    { name: "production_data", regex: /\bproduction\s+(data|database|system)/i, weight: 0.9 },
    { name: "user_data", regex: /\b(user|customer|personal)\s+data/i, weight: 0.8 },
  ],
};

export const DEFAULT_LINE_CUES: ScopeCueTable = {
  cues: [
    { phrases: ["single line", "one line"], value: 1 },
    { phrases: ["few lines"], value: 5 },
    { phrases: ["small", "minor"], value: 20 },
    { phrases: ["large", "major", "significant"], value: 200 },
    { phrases: ["entire", "complete", "full"], value: 500 },
  ],
  defaultValue: 50,
};

/** Widest cue first, so "across the entire codebase" reads as codebase-wide. */
export const DEFAULT_FILE_CUES: ScopeCueTable = {
  cues: [
    { phrases: ["codebase", "project-wide"], value: 20 },
    { phrases: ["across", "throughout"], value: 10 },
    { phrases: ["multiple file", "several file"], value: 5 },
    { phrases: ["single file", "one file", "this file"], value: 1 },
  ],
  defaultValue: 2,
};
