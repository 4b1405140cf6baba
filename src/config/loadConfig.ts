/**
 * Config file loading: JSON validated by AppConfigSchema, then env overrides
 * for secrets and endpoints. A missing file yields the defaults.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { ConfigError } from "../errors.js";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";
import { getAnthropicApiKey, getConfigPath, getDataDir, getGeminiApiKey, getOllamaEndpoint } from "./env.js";

export interface LoadedConfig {
  config: AppConfig;
  /** Config file path that was read (or would be) */
  path: string;
  /** Directory holding config and ledger */
  dataDir: string;
  /** False when defaults were used because the file does not exist */
  fromFile: boolean;
}

export interface LoadConfigOptions {
  dataDir?: string;
  path?: string;
}

export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/** Env wins over file for secrets and the local endpoint. */
export function applyEnvOverrides(config: AppConfig): AppConfig {
  const anthropicKey = getAnthropicApiKey();
  const geminiKey = getGeminiApiKey();
  const endpoint = getOllamaEndpoint();
  return {
    ...config,
    workers: {
      local: endpoint ? { ...config.workers.local, endpoint } : config.workers.local,
      anthropic: anthropicKey ? { ...config.workers.anthropic, apiKey: anthropicKey } : config.workers.anthropic,
      gemini: geminiKey ? { ...config.workers.gemini, apiKey: geminiKey } : config.workers.gemini,
    },
  };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const dataDir = options.dataDir ?? getDataDir();
  const path = options.path ?? getConfigPath(dataDir);

  let raw: string | undefined;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw new ConfigError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  let config: AppConfig;
  if (raw == null) {
    config = parseConfig({});
  } else {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    config = parseConfig(parsed, path);
  }

  return {
    config: applyEnvOverrides(config),
    path,
    dataDir: config.ledger.dataDir ?? dataDir,
    fromFile: raw != null,
  };
}

/** Defaults as written by `init`. Secrets stay in the environment. */
export function defaultConfigDocument(): AppConfig {
  return parseConfig({});
}

export async function writeConfigFile(path: string, config: AppConfig): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
