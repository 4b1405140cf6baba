/**
 * API route registration for Express.
 * Mounts all routes under /api via a dedicated router.
 */

import express, { type Express } from "express";
import type { ApiContext } from "../context.js";
import { createClassifyHandlers } from "./classify.js";
import { createRunHandlers } from "./run.js";
import { createStatusHandlers } from "./status.js";
import { createTaskHandlers } from "./tasks.js";

export function registerApiRoutes(app: Express, ctx: ApiContext): void {
  const api = express.Router();

  const classify = createClassifyHandlers(ctx);
  const run = createRunHandlers(ctx);
  const tasks = createTaskHandlers(ctx);
  const status = createStatusHandlers(ctx);

  api.post("/classify", classify.classifyPost);
  api.post("/run", run.runPost);

  api.get("/tasks", tasks.tasksGet);
  api.get("/tasks/:id", tasks.taskByIdGet);

  api.get("/status", status.statusGet);
  api.get("/workers", status.workersGet);

  app.use("/api", api);
}
