import { initDb, closeDb } from "./db/database.js";
import { buildApp } from "./app.js";
import { contextFromConfig } from "./context.js";
import { startNonceSweep } from "./auth/replay.js";
import { closeAllSubscriptions } from "./events/fanout.js";
import config from "./config.js";

async function main() {
  // Initialize database
  initDb();
  const ctx = contextFromConfig();

  console.log(`[server] Replay window ±${config.maxSkewSecs}s, page length ${config.pageLen}`);
  if (config.roomCreators.length > 0) {
    console.log(`[server] Room creators: ${config.roomCreators.join(", ")}`);
  }

  const app = await buildApp(ctx);

  // Start nonce garbage collection
  const sweepTimer = startNonceSweep(ctx.clock, config.nonceSweepIntervalMs);

  // Start server
  await app.listen({ port: config.port, host: config.host });
  console.log(`[server] Listening on ${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\n[server] Shutting down...");
    clearInterval(sweepTimer);
    closeAllSubscriptions();
    await app.close();
    closeDb();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
