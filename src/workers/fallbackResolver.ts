/**
 * Fallback resolver: the tier's primary backend, then its group's fallback list.
 */

import { fallbackBackendsFor, getTierConfig } from "../tierPolicy.js";
import { debugLog } from "../utils/debug.js";
import type { Backend, Tier, TierPolicy } from "../types.js";
import type { WorkerRegistry } from "./registry.js";
import type { Worker, WorkerLease } from "./types.js";

/** Primary first, then the group list without the primary. */
export function candidateBackends(tier: Tier, policy: TierPolicy): Backend[] {
  const primary = getTierConfig(policy, tier).primaryBackend;
  return [primary, ...fallbackBackendsFor(policy, tier).filter((b) => b !== primary)];
}

/** First registered and available worker, or undefined. Does not claim it. */
export function resolveWorker(tier: Tier, registry: WorkerRegistry, policy: TierPolicy): Worker | undefined {
  for (const backend of candidateBackends(tier, policy)) {
    const worker = registry.get(backend);
    if (worker?.available()) return worker;
  }
  return undefined;
}

/** Same walk as resolveWorker, but claims the worker it picks. */
export function acquireWorker(tier: Tier, registry: WorkerRegistry, policy: TierPolicy): WorkerLease | undefined {
  const candidates = candidateBackends(tier, policy);
  for (const backend of candidates) {
    const lease = registry.get(backend)?.acquire();
    if (lease) {
      if (backend !== candidates[0]) {
        debugLog(`[Resolver] ${tier}: primary ${candidates[0]} unavailable, using ${backend}`);
      }
      return lease;
    }
  }
  debugLog(`[Resolver] ${tier}: no available worker among ${candidates.join(", ")}`);
  return undefined;
}
