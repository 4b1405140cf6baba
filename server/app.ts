/**
 * Express app: JSON API only.
 */

import express, { type Express } from "express";
import cors from "cors";
import type { ApiContext } from "./context.js";
import { registerApiRoutes } from "./routes/index.js";

export function createApp(ctx: ApiContext): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  registerApiRoutes(app, ctx);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  return app;
}
