/**
 * Worker registry: one handle per backend identity. Populated at startup,
 * read-only during runs apart from quota-driven disabling.
 */

import { QuotaExceededError, errorMessage } from "../errors.js";
import type { Backend } from "../types.js";
import type { Worker } from "./types.js";

export interface PreflightReport {
  checked: Backend[];
  disabled: { backend: Backend; reason: string }[];
  warnings: { backend: Backend; message: string }[];
}

export interface WorkerRegistryOptions {
  /** Per-backend limit on one quota probe. Default 15s. */
  preflightTimeoutMs?: number;
}

type ProbeOutcome =
  | { backend: Backend; kind: "ok" }
  | { backend: Backend; kind: "disabled"; reason: string }
  | { backend: Backend; kind: "warning"; message: string };

const DEFAULT_PREFLIGHT_TIMEOUT_MS = 15_000;

export class WorkerRegistry {
  private readonly workers = new Map<Backend, Worker>();
  /** Quota probe per backend, started at most once per registered worker */
  private readonly probes = new Map<Backend, Promise<ProbeOutcome>>();
  private readonly preflightTimeoutMs: number;

  constructor(options: WorkerRegistryOptions = {}) {
    this.preflightTimeoutMs = options.preflightTimeoutMs ?? DEFAULT_PREFLIGHT_TIMEOUT_MS;
  }

  /** Last registration per identity wins; a replaced worker is checked again. */
  register(worker: Worker): void {
    this.workers.set(worker.backend, worker);
    this.probes.delete(worker.backend);
  }

  get(backend: Backend): Worker | undefined {
    return this.workers.get(backend);
  }

  list(): Worker[] {
    return [...this.workers.values()];
  }

  has(backend: Backend): boolean {
    return this.workers.has(backend);
  }

  disable(backend: Backend, reason: string): void {
    this.workers.get(backend)?.disable(reason);
  }

  disabledBackends(): Backend[] {
    return this.list()
      .filter((w) => w.disabledReason() != null)
      .map((w) => w.backend);
  }

  /**
   * Quota pre-flight for every enabled backend not checked yet; backends already
   * probed reuse their result. QuotaExceededError disables the backend; any other
   * failure only warns. A probe that timed out is retried on the next call.
   */
  async preflight(): Promise<PreflightReport> {
    const pending: Promise<ProbeOutcome>[] = [];
    for (const worker of this.list()) {
      let probe = this.probes.get(worker.backend);
      if (!probe) {
        if (worker.disabledReason() != null) continue;
        probe = this.probe(worker);
        this.probes.set(worker.backend, probe);
      }
      pending.push(probe);
    }

    const report: PreflightReport = { checked: [], disabled: [], warnings: [] };
    for (const outcome of await Promise.all(pending)) {
      report.checked.push(outcome.backend);
      if (outcome.kind === "disabled") {
        report.disabled.push({ backend: outcome.backend, reason: outcome.reason });
      } else if (outcome.kind === "warning") {
        report.warnings.push({ backend: outcome.backend, message: outcome.message });
      }
    }
    return report;
  }

  private async probe(worker: Worker): Promise<ProbeOutcome> {
    const { backend } = worker;
    const signal = AbortSignal.timeout(this.preflightTimeoutMs);
    try {
      await worker.checkQuota(signal);
      return { backend, kind: "ok" };
    } catch (e) {
      if (e instanceof QuotaExceededError) {
        worker.disable(e.message);
        console.warn(`[Registry] ${backend} disabled: ${e.message}`);
        return { backend, kind: "disabled", reason: e.message };
      }
      const message = errorMessage(e);
      if (signal.aborted && this.workers.get(backend) === worker) {
        this.probes.delete(backend);
      }
      console.warn(`[Registry] ${backend} pre-flight failed, keeping it enabled: ${message}`);
      return { backend, kind: "warning", message };
    }
  }
}
