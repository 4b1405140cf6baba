/**
 * Startup wiring shared by the CLI and the HTTP server:
 * config -> policy -> ledger -> workers -> conductor.
 */

import { Conductor } from "./conductor.js";
import { getDatabaseUrl, getRunLogPath } from "./config/env.js";
import { loadConfig } from "./config/loadConfig.js";
import type { LoadedConfig } from "./config/loadConfig.js";
import { openLedger } from "./lib/ledger/index.js";
import type { LedgerStore } from "./lib/ledger/types.js";
import { createTierPolicy } from "./tierPolicy.js";
import type { TierPolicy } from "./types.js";
import { createRegistry, createWorkers } from "./workers/index.js";

export interface RuntimeOptions {
  dataDir?: string;
  configPath?: string;
  mock?: boolean;
}

export interface Runtime {
  loaded: LoadedConfig;
  policy: TierPolicy;
  ledger: LedgerStore;
  conductor: Conductor;
  close(): Promise<void>;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const loaded = await loadConfig({ dataDir: options.dataDir, path: options.configPath });
  const { config } = loaded;
  const policy = createTierPolicy(config.policy);
  const ledger = await openLedger({
    dataDir: loaded.dataDir,
    driver: config.ledger.driver,
    databaseUrl: getDatabaseUrl(),
    assumedCostPerTaskUSD: config.savings.assumedCostPerTaskUSD,
  });
  const registry = createRegistry(createWorkers(config, { mock: options.mock }));
  const conductor = new Conductor({
    policy,
    ledger,
    registry,
    runLogPath: getRunLogPath() ?? config.runLog.path,
  });
  return {
    loaded,
    policy,
    ledger,
    conductor,
    close: () => ledger.close(),
  };
}
