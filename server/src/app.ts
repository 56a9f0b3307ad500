// server/src/app.ts
/** Express app wiring: security (helmet), CORS allowlist, parsers, logging, rate limit, routes, 404 + error. */
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import morgan from "morgan";

import { corsOrigins, env } from "./config/env.js";
import { httpLogStream } from "./config/logger.js";
import type { Services } from "./container.js";
import { errorHandler } from "./middlewares/error.js";
import { notFound } from "./middlewares/notFound.js";
import { rateLimit } from "./middlewares/rateLimit.js";
import { buildRouter } from "./routes.js";
import { requestId } from "./utils/ids.js";

export function createApp(services: Services): Express {
  const app = express();

  // security + parsing
  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // request id first
  app.use(requestId);

  // CORS allowlist
  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true); // allow same-origin/local tools
        if (corsOrigins.includes(origin)) return cb(null, true);
        return cb(new Error("CORS not allowed"), false);
      },
      credentials: true,
    })
  );

  // dev http logs
  if (env.NODE_ENV === "development") {
    app.use(morgan("tiny", { stream: httpLogStream }));
  }

  app.use(rateLimit());

  app.use("/", buildRouter(services));

  // 404 + error
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
