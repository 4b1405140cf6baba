/**
 * Ledger factory: file or db engine per the persistence driver.
 */

import { getDb } from "../db/index.js";
import { getPersistenceDriver } from "../persistence/driver.js";
import type { PersistenceDriver } from "../persistence/driver.js";
import { DbLedgerStore } from "./dbLedger.js";
import { FileLedgerStore } from "./fileLedger.js";
import type { LedgerStore, LedgerStoreOptions } from "./types.js";

export { DbLedgerStore } from "./dbLedger.js";
export { FileLedgerStore, LEDGER_FILENAME } from "./fileLedger.js";
export { computeSavings } from "./stats.js";
export * from "./types.js";

export interface OpenLedgerOptions extends LedgerStoreOptions {
  dataDir: string;
  driver?: PersistenceDriver;
  databaseUrl?: string;
}

export async function openLedger(options: OpenLedgerOptions): Promise<LedgerStore> {
  const driver = getPersistenceDriver(options.driver);
  const storeOptions: LedgerStoreOptions = { assumedCostPerTaskUSD: options.assumedCostPerTaskUSD };
  if (driver === "db") {
    return DbLedgerStore.open(getDb(options.databaseUrl), storeOptions);
  }
  return FileLedgerStore.open(options.dataDir, storeOptions);
}
