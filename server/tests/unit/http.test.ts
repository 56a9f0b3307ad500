import { describe, expect, it } from "vitest";
import { z } from "zod";

import { conflict, invalidInput, invalidTransition, notFound, ok } from "../../src/domain/result.js";
import { toErrorResponse } from "../../src/middlewares/error.js";
import { AppError, toAppError, unwrap } from "../../src/utils/http.js";

describe("toAppError", () => {
  it("maps NotFound to 404", () => {
    const err = toAppError(notFound("vehicle", "abc"));
    expect([err.status, err.code, err.message]).toEqual([404, "NOT_FOUND", "Vehicle abc not found"]);
    expect(err.details).toEqual({ entity: "vehicle", id: "abc" });
  });

  it("maps InvalidInput to 422 with the field", () => {
    const err = toAppError(invalidInput("start must be before end", "end"));
    expect([err.status, err.code]).toEqual([422, "INVALID_INPUT"]);
    expect(err.details).toEqual({ field: "end" });
  });

  it("maps Conflict to 409 carrying the witness", () => {
    const err = toAppError(conflict("taken", "r1"));
    expect([err.status, err.code]).toEqual([409, "CONFLICT"]);
    expect(err.details).toEqual({ conflictingReservationId: "r1" });
    expect(toAppError(conflict("sold")).details).toBeUndefined();
  });

  it("maps InvalidTransition to 409", () => {
    const err = toAppError(invalidTransition("cancelled", "confirm"));
    expect([err.status, err.code, err.message]).toEqual([
      409,
      "INVALID_TRANSITION",
      "Cannot confirm a cancelled reservation",
    ]);
  });

  it("maps Busy to 503 with Retry-After in whole seconds", () => {
    const busy = (retryAfterMs: number) =>
      toAppError({ kind: "Busy", retryAfterMs, message: "busy" }).headers;
    expect(busy(2_500)).toEqual({ "Retry-After": "3" });
    expect(busy(20)).toEqual({ "Retry-After": "1" });
    expect(toAppError({ kind: "Busy", retryAfterMs: 20, message: "busy" }).status).toBe(503);
  });
});

describe("unwrap", () => {
  it("returns values and throws failures as AppError", () => {
    expect(unwrap(ok(5))).toBe(5);
    expect(() => unwrap({ ok: false, error: notFound("reservation", "r9") })).toThrow(AppError);
  });
});

describe("toErrorResponse", () => {
  it("renders zod failures as 422 with flattened details", () => {
    const parsed = z.object({ vehicleId: z.string() }).safeParse({});
    if (parsed.success) throw new Error("expected a zod failure");
    expect(toErrorResponse(parsed.error, "req-1")).toEqual({
      status: 422,
      headers: {},
      body: {
        error: {
          code: "UNPROCESSABLE_ENTITY",
          message: "Invalid request",
          requestId: "req-1",
          details: { formErrors: [], fieldErrors: { vehicleId: ["Required"] } },
        },
      },
    });
  });

  it("renders AppError with its headers", () => {
    const err = toAppError({ kind: "Busy", retryAfterMs: 3_000, message: "Vehicle v1 is busy, retry shortly" });
    expect(toErrorResponse(err, "req-2")).toEqual({
      status: 503,
      headers: { "Retry-After": "3" },
      body: { error: { code: "BUSY", message: "Vehicle v1 is busy, retry shortly", requestId: "req-2" } },
    });
  });

  it("passes through client errors from the body parser", () => {
    const err = Object.assign(new Error("Unexpected token } in JSON"), { status: 400 });
    expect(toErrorResponse(err).status).toBe(400);
    expect(toErrorResponse(err).body.error.code).toBe("BAD_REQUEST");
  });

  it("hides internals behind a 500", () => {
    expect(toErrorResponse(new Error("connection refused"), "req-3")).toEqual({
      status: 500,
      headers: {},
      body: { error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId: "req-3" } },
    });
  });
});
