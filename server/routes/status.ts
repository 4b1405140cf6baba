import type { ApiContext, ApiHandler } from "../context.js";
import { sendServerError } from "../context.js";

export function createStatusHandlers(ctx: ApiContext): { statusGet: ApiHandler; workersGet: ApiHandler } {
  return {
    async statusGet(_req, res) {
      try {
        const stats = await ctx.ledger.getStats();
        const schemaVersion = (await ctx.ledger.getMetadata("schema_version")) ?? null;
        res.json({ stats, schemaVersion });
      } catch (e) {
        sendServerError(res, "status", e);
      }
    },

    async workersGet(_req, res) {
      const workers = ctx.conductor.registry.list().map((w) => ({
        id: w.id,
        backend: w.backend,
        available: w.available(),
        disabledReason: w.disabledReason() ?? null,
      }));
      res.json({ workers });
    },
  };
}
