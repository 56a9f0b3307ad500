// server/src/routes.ts
/** API surface: health endpoints plus the vehicle and reservation routers. */
import { Router } from "express";

import { pingMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { pingRedis } from "./config/redis.js";
import type { Services } from "./container.js";
import { reservationsRouter } from "./modules/reservations/routes.js";
import { vehiclesRouter } from "./modules/vehicles/routes.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

type DepStatus = { status: "ok" | "error" | "disabled"; message?: string };

export function buildRouter(services: Services): Router {
  const router = Router();

  // Basic health (no deps)
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const uptime = process.uptime();
      const version = process.env.npm_package_version || "0.0.0";
      jsonOk(res, { status: "ok", uptime, version });
    })
  );

  // Dependencies health (actual pings, only for drivers in use)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const disabled: DepStatus = { status: "disabled" };
      const [mongo, redis] = await Promise.all([
        env.STORE_DRIVER === "mongo" ? pingMongo() : Promise.resolve(disabled),
        env.LOCK_DRIVER === "redis" ? pingRedis() : Promise.resolve(disabled),
      ]);
      const body: { mongo: string; redis: string; details?: Record<string, string | undefined> } = {
        mongo: mongo.status,
        redis: redis.status,
      };
      if (mongo.status === "error" || redis.status === "error") {
        body.details = { mongo: mongo.message, redis: redis.message };
      }
      jsonOk(res, body, mongo.status === "error" || redis.status === "error" ? 503 : 200);
    })
  );

  // Feature mounts
  router.use("/vehicles", vehiclesRouter(services));
  router.use("/reservations", reservationsRouter(services));

  return router;
}
