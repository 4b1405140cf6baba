/**
 * Environment getters with safe parsing and clamped defaults.
 */

import { join } from "path";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function stringEnv(key: string): string | undefined {
  const v = process.env[key]?.trim();
  return v ? v : undefined;
}

/** Working directory for config and ledger. Default ./.task-router */
export function getDataDir(): string {
  return stringEnv("TASK_ROUTER_DATA_DIR") ?? join(process.cwd(), ".task-router");
}

/** Config file path. Default <dataDir>/config.json */
export function getConfigPath(dataDir: string = getDataDir()): string {
  return stringEnv("TASK_ROUTER_CONFIG") ?? join(dataDir, "config.json");
}

/** HTTP port. Default 3000. */
export function getPort(): number {
  return parseIntEnv("PORT", 3000, 1, 65_535);
}

export function getAnthropicApiKey(): string | undefined {
  return stringEnv("ANTHROPIC_API_KEY");
}

export function getGeminiApiKey(): string | undefined {
  return stringEnv("GEMINI_API_KEY");
}

export function getOllamaEndpoint(): string | undefined {
  return stringEnv("OLLAMA_ENDPOINT");
}

export function getDatabaseUrl(): string | undefined {
  return stringEnv("DATABASE_URL");
}

/** JSONL run log; unset disables run logging. */
export function getRunLogPath(): string | undefined {
  return stringEnv("RUN_LOG_PATH");
}
