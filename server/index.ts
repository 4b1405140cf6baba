/**
 * Express server entry point.
 */

import { createApp } from "./app.js";
import { getPort } from "../src/config/env.js";
import { createRuntime } from "../src/runtime.js";

async function start() {
  const mock = process.argv.includes("--mock");
  const runtime = await createRuntime({ mock });
  const app = createApp({ conductor: runtime.conductor, ledger: runtime.ledger });
  const port = getPort();

  const server = app.listen(port, "0.0.0.0", () => {
    console.log(`[Server] Task router API at http://0.0.0.0:${port}${mock ? " (mock workers)" : ""}`);
  });

  const shutdown = () => {
    server.close(() => {
      runtime.close().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error("[Server] Ledger close failed:", e instanceof Error ? e.message : e);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
