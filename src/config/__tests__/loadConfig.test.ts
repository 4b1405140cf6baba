import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { loadConfig, parseConfig, writeConfigFile, defaultConfigDocument } from "../loadConfig.js";
import { getPort } from "../env.js";
import { getPersistenceDriver } from "../../lib/persistence/driver.js";
import { ConfigError } from "../../errors.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "task-router-config-"));
  vi.stubEnv("TASK_ROUTER_CONFIG", "");
  vi.stubEnv("ANTHROPIC_API_KEY", "");
  vi.stubEnv("GEMINI_API_KEY", "");
  vi.stubEnv("OLLAMA_ENDPOINT", "");
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await rm(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("falls back to defaults when the file is missing", async () => {
    const loaded = await loadConfig({ dataDir: dir });
    expect(loaded.fromFile).toBe(false);
    expect(loaded.path).toBe(join(dir, "config.json"));
    expect(loaded.dataDir).toBe(dir);
    expect(loaded.config.workers.local.endpoint).toBe("http://localhost:11434");
    expect(loaded.config.workers.local.models.reasoning).toBe("qwen3:14b");
    expect(loaded.config.workers.gemini.enabled).toBe(false);
    expect(loaded.config.savings.assumedCostPerTaskUSD).toBe(0.05);
  });

  it("fills defaults around the values a file sets", async () => {
    await writeFile(
      join(dir, "config.json"),
      JSON.stringify({ workers: { local: { endpoint: "http://gpu-box:11434" } }, savings: { assumedCostPerTaskUSD: 0.1 } })
    );
    const loaded = await loadConfig({ dataDir: dir });
    expect(loaded.fromFile).toBe(true);
    expect(loaded.config.workers.local.endpoint).toBe("http://gpu-box:11434");
    expect(loaded.config.workers.local.models.fast).toBe("phi3:mini");
    expect(loaded.config.savings.assumedCostPerTaskUSD).toBe(0.1);
  });

  it("rejects invalid values with the offending path", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ workers: { local: { timeoutMs: -5 } } }));
    await expect(loadConfig({ dataDir: dir })).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig({ dataDir: dir })).rejects.toThrow("workers.local.timeoutMs");
  });

  it("rejects malformed JSON", async () => {
    await writeFile(join(dir, "config.json"), "{ not json");
    await expect(loadConfig({ dataDir: dir })).rejects.toThrow("is not valid JSON");
  });

  it("lets the environment supply secrets and the local endpoint", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
    vi.stubEnv("OLLAMA_ENDPOINT", "http://127.0.0.1:9999");
    const loaded = await loadConfig({ dataDir: dir });
    expect(loaded.config.workers.anthropic.apiKey).toBe("test-secret");
    expect(loaded.config.workers.gemini.apiKey).toBeUndefined();
    expect(loaded.config.workers.local.endpoint).toBe("http://127.0.0.1:9999");
  });

  it("moves the ledger when the file names a data dir", async () => {
    const ledgerDir = join(dir, "ledger");
    await writeFile(join(dir, "config.json"), JSON.stringify({ ledger: { dataDir: ledgerDir } }));
    const loaded = await loadConfig({ dataDir: dir });
    expect(loaded.dataDir).toBe(ledgerDir);
  });

  it("reads back what init writes", async () => {
    const path = join(dir, "nested", "config.json");
    await writeConfigFile(path, defaultConfigDocument());
    const loaded = await loadConfig({ path });
    expect(loaded.fromFile).toBe(true);
    expect(loaded.config).toEqual(parseConfig({}));
  });
});

describe("env getters", () => {
  it("clamps the port", () => {
    vi.stubEnv("PORT", "99999");
    expect(getPort()).toBe(65_535);
    vi.stubEnv("PORT", "abc");
    expect(getPort()).toBe(3000);
  });

  it("lets PERSISTENCE_DRIVER override the configured driver", () => {
    vi.stubEnv("PERSISTENCE_DRIVER", "");
    expect(getPersistenceDriver()).toBe("file");
    expect(getPersistenceDriver("db")).toBe("db");
    vi.stubEnv("PERSISTENCE_DRIVER", "FILE");
    expect(getPersistenceDriver("db")).toBe("file");
    vi.stubEnv("PERSISTENCE_DRIVER", "db");
    expect(getPersistenceDriver()).toBe("db");
  });
});
