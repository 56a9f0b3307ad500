/**
 * Typed outcomes for engine operations.
 *
 * Business rejections (unknown ids, bad input, conflicts, illegal transitions, a busy vehicle)
 * come back as values so callers must handle them; store failures are still thrown.
 */
import type { ReservationEvent, ReservationStatus } from "./enums.js";

export type NotFound = {
  kind: "NotFound";
  entity: "vehicle" | "reservation";
  id: string;
  message: string;
};

export type InvalidInput = {
  kind: "InvalidInput";
  field?: string;
  message: string;
};

export type Conflict = {
  kind: "Conflict";
  /** Absent when the vehicle is sold and the sale record is unknown. */
  conflictingReservationId?: string;
  message: string;
};

export type InvalidTransition = {
  kind: "InvalidTransition";
  from: ReservationStatus;
  event: ReservationEvent;
  message: string;
};

/** Per-vehicle lock not acquired in time. Outcome of the attempted call is "nothing happened". */
export type Busy = {
  kind: "Busy";
  retryAfterMs: number;
  message: string;
};

export type EngineFailure = NotFound | InvalidInput | Conflict | InvalidTransition | Busy;

export type Result<T, E extends EngineFailure = EngineFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends EngineFailure>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function notFound(entity: NotFound["entity"], id: string): NotFound {
  const label = entity === "vehicle" ? "Vehicle" : "Reservation";
  return { kind: "NotFound", entity, id, message: `${label} ${id} not found` };
}

export function invalidInput(message: string, field?: string): InvalidInput {
  return field === undefined
    ? { kind: "InvalidInput", message }
    : { kind: "InvalidInput", field, message };
}

export function conflict(message: string, conflictingReservationId?: string): Conflict {
  return conflictingReservationId === undefined
    ? { kind: "Conflict", message }
    : { kind: "Conflict", conflictingReservationId, message };
}

export function invalidTransition(
  from: ReservationStatus,
  event: ReservationEvent,
  reason?: string
): InvalidTransition {
  const base = `Cannot ${event} a ${from} reservation`;
  return { kind: "InvalidTransition", from, event, message: reason ? `${base}: ${reason}` : base };
}
