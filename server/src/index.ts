// server/src/index.ts
/** Boot file: picks drivers, creates the HTTP server, runs the availability sweep, and handles graceful shutdown. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { closeRedis } from "./config/redis.js";
import { buildInfrastructure, wireServices, type Services } from "./container.js";
import { errorMessage } from "./utils/http.js";

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { message: err.message, stack: err.stack });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { message: errorMessage(reason) });
});

let server: http.Server | null = null;
let sweepTimer: NodeJS.Timeout | null = null;

function startSweep(services: Services) {
  if (env.AVAILABILITY_SWEEP_MS <= 0) return;
  let running = false;
  sweepTimer = setInterval(() => {
    if (running) return;
    running = true;
    services.coordinator
      .sweepAvailability()
      .then((summary) => {
        if (summary.changed || summary.busy || summary.failed) {
          logger.info("availability.sweep", summary);
        }
      })
      .catch((err: unknown) => {
        logger.error("availability.sweep_failed", { message: errorMessage(err) });
      })
      .finally(() => {
        running = false;
      });
  }, env.AVAILABILITY_SWEEP_MS);
  sweepTimer.unref();
}

const start = async () => {
  // ensure data deps are up before listening
  if (env.STORE_DRIVER === "mongo") await connectMongo();
  const services = wireServices(await buildInfrastructure());

  server = http.createServer(createApp(services));
  server.listen(env.PORT, () => {
    logger.info(`Reservation server listening on :${env.PORT}`, { env: env.NODE_ENV });
  });
  startSweep(services);
};

const shutdown = (signal: string) => {
  logger.warn(`Received ${signal}, shutting down...`);
  if (sweepTimer) clearInterval(sweepTimer);
  void Promise.allSettled([closeMongo(), closeRedis()]).finally(() => {
    if (!server) process.exit(0);
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
    setTimeout(() => {
      logger.error("Forced shutdown");
      process.exit(1);
    }, 10_000).unref();
  });
};

(["SIGINT", "SIGTERM"] as const).forEach((sig) => process.on(sig, () => shutdown(sig)));

start().catch((err: unknown) => {
  logger.error("Startup failed", {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
