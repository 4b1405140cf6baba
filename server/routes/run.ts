import { z } from "zod";
import type { ApiContext, ApiHandler } from "../context.js";
import { sendInvalid, sendServerError } from "../context.js";
import { TierSchema } from "../../src/config/schema.js";

const RunBody = z.object({
  title: z.string().trim().min(1),
  description: z.string().default(""),
  tier: TierSchema.optional(),
  dryRun: z.boolean().default(false),
});

export function createRunHandlers(ctx: ApiContext): { runPost: ApiHandler } {
  return {
    async runPost(req, res) {
      const parsed = RunBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const { title, description, tier, dryRun } = parsed.data;
      try {
        const result = dryRun
          ? ctx.conductor.dryRun(title, description, { tier })
          : await ctx.conductor.run(title, description, { tier });
        res.json(result);
      } catch (e) {
        sendServerError(res, "run", e);
      }
    },
  };
}
