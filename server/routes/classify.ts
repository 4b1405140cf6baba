import { z } from "zod";
import type { ApiContext, ApiHandler } from "../context.js";
import { sendInvalid, sendServerError } from "../context.js";
import { fallbackBackendsFor, getTierConfig } from "../../src/tierPolicy.js";

const ClassifyBody = z.object({
  title: z.string().trim().min(1),
  description: z.string().default(""),
});

export function createClassifyHandlers(ctx: ApiContext): { classifyPost: ApiHandler } {
  return {
    async classifyPost(req, res) {
      const parsed = ClassifyBody.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      try {
        const { conductor } = ctx;
        const classification = conductor.classify(parsed.data.title, parsed.data.description);
        res.json({
          classification,
          tierConfig: getTierConfig(conductor.policy, classification.tier),
          fallbackBackends: fallbackBackendsFor(conductor.policy, classification.tier),
        });
      } catch (e) {
        sendServerError(res, "classify", e);
      }
    },
  };
}
