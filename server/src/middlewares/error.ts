// server/src/middlewares/error.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { AppError } from "../utils/http.js";

export type ErrorBody = {
  error: { code: string; message: string; requestId?: string; details?: unknown };
};

export type ErrorResponse = { status: number; headers: Record<string, string>; body: ErrorBody };

/** Maps anything thrown by a route to the uniform error payload. */
export function toErrorResponse(err: unknown, requestId?: string): ErrorResponse {
  if (err instanceof ZodError) {
    return {
      status: 422,
      headers: {},
      body: {
        error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request", requestId, details: err.flatten() },
      },
    };
  }

  if (err instanceof AppError) {
    return {
      status: err.status,
      headers: err.headers ?? {},
      body: {
        error: {
          code: err.code,
          message: err.message,
          requestId,
          ...(err.details ? { details: err.details } : {}),
        },
      },
    };
  }

  // body-parser and friends set a numeric status on client errors
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status < 500) {
    return {
      status: err.status,
      headers: {},
      body: { error: { code: "BAD_REQUEST", message: err.message, requestId } },
    };
  }

  return {
    status: 500,
    headers: {},
    body: { error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId } },
  };
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
  const out = toErrorResponse(err, requestId);

  if (out.status >= 500) {
    // always log stack if present
    logger.error(err instanceof Error ? err.message : "Unhandled error", {
      requestId,
      status: out.status,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.info(out.body.error.message, { requestId, status: out.status, code: out.body.error.code });
  }

  res.set(out.headers).status(out.status).json(out.body);
};
