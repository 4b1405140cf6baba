import { z } from "zod";
import type { ApiContext, ApiHandler } from "../context.js";
import { sendInvalid, sendServerError } from "../context.js";
import { TASK_STATUSES } from "../../src/types.js";

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
  status: z.enum(TASK_STATUSES).optional(),
});

export function createTaskHandlers(ctx: ApiContext): { tasksGet: ApiHandler; taskByIdGet: ApiHandler } {
  return {
    async tasksGet(req, res) {
      const parsed = ListQuery.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      try {
        const tasks = await ctx.ledger.listTasks(parsed.data);
        res.json({ tasks });
      } catch (e) {
        sendServerError(res, "list tasks", e);
      }
    },

    async taskByIdGet(req, res) {
      const id = req.params.id ?? "";
      try {
        const task = await ctx.ledger.getTask(id);
        if (!task) {
          res.status(404).json({ error: `Task not found: ${id}` });
          return;
        }
        const executions = await ctx.ledger.listExecutions(id);
        res.json({ task, executions });
      } catch (e) {
        sendServerError(res, "get task", e);
      }
    },
  };
}
