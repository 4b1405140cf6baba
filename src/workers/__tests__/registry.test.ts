import { describe, it, expect, vi, afterEach } from "vitest";
import { WorkerRegistry } from "../registry.js";
import { MockWorker } from "../mockWorker.js";
import { QuotaExceededError } from "../../errors.js";

/** First probe hangs until its signal aborts; later probes report exhaustion. */
class SlowQuotaWorker extends MockWorker {
  probes = 0;

  async checkQuota(signal?: AbortSignal): Promise<void> {
    this.probes++;
    if (this.probes > 1) throw new QuotaExceededError(this.backend, "out of credit");
    await new Promise<void>((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("probe timed out")), { once: true });
    });
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("WorkerRegistry", () => {
  it("keeps the last registration per backend", () => {
    const registry = new WorkerRegistry();
    registry.register(new MockWorker("first", "ollama:fast"));
    registry.register(new MockWorker("second", "ollama:fast"));
    expect(registry.list()).toHaveLength(1);
    expect(registry.get("ollama:fast")?.id).toBe("second");
    expect(registry.get("claude:opus")).toBeUndefined();
  });

  it("disables a backend whose quota check reports exhaustion", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = new WorkerRegistry();
    registry.register(new MockWorker("a", "claude:opus", { quota: "exceeded" }));
    registry.register(new MockWorker("b", "claude:sonnet"));

    const report = await registry.preflight();

    expect(report.disabled).toEqual([{ backend: "claude:opus", reason: "mock quota exhausted" }]);
    expect(registry.disabledBackends()).toEqual(["claude:opus"]);
    expect(registry.get("claude:opus")?.available()).toBe(false);
    expect(registry.get("claude:sonnet")?.available()).toBe(true);
  });

  it("keeps a backend enabled when its check fails for other reasons", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = new WorkerRegistry();
    registry.register(new MockWorker("a", "ollama:default", { quota: "unreachable" }));

    const report = await registry.preflight();

    expect(report.warnings).toEqual([{ backend: "ollama:default", message: "mock ollama:default unreachable" }]);
    expect(registry.disabledBackends()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      "[Registry] ollama:default pre-flight failed, keeping it enabled: mock ollama:default unreachable"
    );
  });

  it("runs the pre-flight once per process", async () => {
    const registry = new WorkerRegistry();
    const worker = new MockWorker("a", "claude:haiku");
    const check = vi.spyOn(worker, "checkQuota");
    registry.register(worker);

    await registry.preflight();
    await registry.preflight();

    expect(check).toHaveBeenCalledTimes(1);
  });

  it("checks a worker registered after the first pre-flight", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = new WorkerRegistry();
    const early = new MockWorker("a", "ollama:fast");
    const check = vi.spyOn(early, "checkQuota");
    registry.register(early);
    await registry.preflight();

    registry.register(new MockWorker("b", "claude:sonnet", { quota: "exceeded" }));
    const report = await registry.preflight();

    expect(check).toHaveBeenCalledTimes(1);
    expect(report.checked).toEqual(["ollama:fast", "claude:sonnet"]);
    expect(registry.disabledBackends()).toEqual(["claude:sonnet"]);
  });

  it("re-checks a replaced worker", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = new WorkerRegistry();
    registry.register(new MockWorker("a", "claude:opus"));
    await registry.preflight();

    registry.register(new MockWorker("b", "claude:opus", { quota: "exceeded" }));
    await registry.preflight();

    expect(registry.get("claude:opus")?.disabledReason()).toBe("mock quota exhausted");
  });

  it("probes with its own deadline and retries a probe that timed out", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = new WorkerRegistry({ preflightTimeoutMs: 5 });
    const worker = new SlowQuotaWorker("a", "claude:sonnet");
    registry.register(worker);

    const first = await registry.preflight();
    expect(first.warnings).toEqual([{ backend: "claude:sonnet", message: "probe timed out" }]);
    expect(worker.available()).toBe(true);
    expect(warn).toHaveBeenCalledWith("[Registry] claude:sonnet pre-flight failed, keeping it enabled: probe timed out");

    const second = await registry.preflight();
    expect(second.disabled).toEqual([{ backend: "claude:sonnet", reason: "out of credit" }]);
    expect(worker.probes).toBe(2);
    expect(worker.available()).toBe(false);

    await registry.preflight();
    expect(worker.probes).toBe(2);
  });

  it("does not probe a backend disabled before the pre-flight", async () => {
    const registry = new WorkerRegistry();
    const worker = new MockWorker("a", "gemini:pro");
    const check = vi.spyOn(worker, "checkQuota");
    registry.register(worker);
    registry.disable("gemini:pro", "manual");

    const report = await registry.preflight();

    expect(check).not.toHaveBeenCalled();
    expect(report.checked).toEqual([]);
  });

  it("disables by backend on request", () => {
    const registry = new WorkerRegistry();
    registry.register(new MockWorker("a", "gemini:flash"));
    registry.disable("gemini:flash", "manual");
    expect(registry.get("gemini:flash")?.disabledReason()).toBe("manual");
  });
});
