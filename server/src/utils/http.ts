// server/src/utils/http.ts
/** Helpers: asyncHandler to bubble errors to express; jsonOk for concise success responses; AppError + result unwrapping. */

import type { Request, Response, NextFunction, RequestHandler } from "express";

import type { EngineFailure, Result } from "../domain/result.js";

export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

export const jsonOk = (res: Response, body: unknown, status = 200) => {
  res.status(status).json(body);
};

/** Error carrying an HTTP status and a stable code; rendered by middlewares/error.ts. */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly headers?: Record<string, string>;

  constructor(
    message: string,
    opts: {
      status: number;
      code: string;
      details?: Record<string, unknown>;
      headers?: Record<string, string>;
    }
  ) {
    super(message);
    this.name = "AppError";
    this.status = opts.status;
    this.code = opts.code;
    this.details = opts.details;
    this.headers = opts.headers;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toAppError(failure: EngineFailure): AppError {
  switch (failure.kind) {
    case "NotFound":
      return new AppError(failure.message, {
        status: 404,
        code: "NOT_FOUND",
        details: { entity: failure.entity, id: failure.id },
      });
    case "InvalidInput":
      return new AppError(failure.message, {
        status: 422,
        code: "INVALID_INPUT",
        details: failure.field ? { field: failure.field } : undefined,
      });
    case "Conflict":
      return new AppError(failure.message, {
        status: 409,
        code: "CONFLICT",
        details: failure.conflictingReservationId
          ? { conflictingReservationId: failure.conflictingReservationId }
          : undefined,
      });
    case "InvalidTransition":
      return new AppError(failure.message, {
        status: 409,
        code: "INVALID_TRANSITION",
        details: { from: failure.from, event: failure.event },
      });
    case "Busy":
      return new AppError(failure.message, {
        status: 503,
        code: "BUSY",
        headers: { "Retry-After": String(Math.max(1, Math.ceil(failure.retryAfterMs / 1000))) },
      });
  }
}

/** Returns the value of a successful result or throws the matching AppError. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw toAppError(result.error);
  return result.value;
}
