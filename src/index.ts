// Mailbox Mirror - Main Entry Point
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config/index.js";
import { createAppContext } from "./context.js";
import { createHandlers, WorkerPool } from "./jobs/index.js";
import { Scheduler } from "./scheduler/index.js";

async function main() {
  console.log("Mailbox Mirror starting...");

  const config = loadConfig();

  // Opening the database applies the schema
  console.log(`Opening database at ${config.database.url}...`);
  const ctx = createAppContext(config);

  console.log("Starting worker pool...");
  const workerPool = new WorkerPool(
    ctx.queue,
    createHandlers({ syncEngine: ctx.syncEngine, flags: ctx.flags }),
    { workers: config.queue.workers }
  );
  await workerPool.start();

  console.log("Starting scheduler...");
  const scheduler = new Scheduler(ctx.queue, ctx.principals, config.scheduler);
  await scheduler.start();

  const { host, port } = config.server;
  console.log(`Starting HTTP server on http://${host}:${port}`);
  const server = serve({
    fetch: createApp(ctx).fetch,
    port,
    hostname: host,
  });

  console.log("Mailbox Mirror ready!");

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down gracefully...`);

    server.close();
    await scheduler.stop();
    await workerPool.stop();
    await ctx.close();

    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error("Failed to start application:", error);
  process.exit(1);
});
