import "dotenv/config";
import { serve } from "@hono/node-server";
import { errorMessage } from "@mediasift/utils";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

async function main() {
  const config = loadConfig();
  const app = await createApp(config);

  const server = serve({ fetch: app.handler, port: config.port, hostname: config.host }, (info) => {
    console.log(`[Server] Listening on http://${info.address}:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, draining jobs...`);
    server.close();
    app
      .close()
      .then(() => console.log("[Server] Shutdown complete."))
      .catch((err: unknown) => {
        console.error(`[Server] Shutdown failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
