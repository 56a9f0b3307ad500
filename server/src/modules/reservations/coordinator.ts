import { deriveAvailability } from "./availability.js";
import { OverlapValidator } from "./overlap.js";
import { nextStatus } from "./stateMachine.js";
import {
  termsOf,
  type Reservation,
  type ReservationFilter,
  type ReservationLedger,
  type ReservationPatch,
  type ReservationTerms,
} from "./types.js";
import { logger } from "../../config/logger.js";
import type { Availability, ReservationEvent, TransactionType } from "../../domain/enums.js";
import { isValidCents, type MoneyCents } from "../../domain/money.js";
import {
  fail,
  invalidInput,
  invalidTransition,
  notFound,
  ok,
  type Busy,
  type Conflict,
  type EngineFailure,
  type InvalidInput,
  type InvalidTransition,
  type NotFound,
  type Result,
} from "../../domain/result.js";
import { isValidDate, type Clock } from "../../utils/dates.js";
import { errorMessage } from "../../utils/http.js";
import type { AuditSink, ReservationAction } from "../audit/service.js";
import { serializeOnVehicle, type VehicleLock } from "../locks/service.js";
import type { Page, Vehicle, VehicleFilter, VehicleRegistry } from "../vehicles/types.js";

export const MAX_NOTES_LENGTH = 500;

/** Loose terms as they arrive; validated into ReservationTerms. A sale's end is ignored. */
export type TermsInput = { type: TransactionType; start?: Date; end?: Date };

export type ReservationRequest = {
  vehicleId: string;
  userId: string;
  terms: TermsInput;
  priceCents: MoneyCents;
  notes?: string | null;
};

export type AmendInput = {
  start?: Date;
  end?: Date;
  priceCents?: MoneyCents;
  notes?: string | null;
};

export type CancelOptions = { allowMidTerm?: boolean };

export type AvailabilityChange = { vehicleId: string; from: Availability; to: Availability };

export type SweepSummary = { checked: number; changed: number; busy: number; failed: number };

export type CoordinatorDeps = {
  registry: VehicleRegistry;
  ledger: ReservationLedger;
  lock: VehicleLock;
  audit: AuditSink;
  clock: Clock;
  /** Default for `cancel` when the caller does not say. */
  allowMidTermCancel?: boolean;
};

/** Validates request terms against `now`; sales default their hand-over to `now`. */
export function validateTerms(input: TermsInput, now: Date): Result<ReservationTerms, InvalidInput> {
  if (input.type === "sale") {
    const start = input.start ?? now;
    if (!isValidDate(start)) return fail(invalidInput("start must be a valid date", "start"));
    return ok({ type: "sale", start });
  }
  if (!input.start || !input.end) {
    return fail(invalidInput("A rental needs both start and end", input.start ? "end" : "start"));
  }
  if (!isValidDate(input.start)) return fail(invalidInput("start must be a valid date", "start"));
  if (!isValidDate(input.end)) return fail(invalidInput("end must be a valid date", "end"));
  if (input.start.getTime() >= input.end.getTime()) {
    return fail(invalidInput("start must be before end", "end"));
  }
  return ok({ type: "rental", start: input.start, end: input.end });
}

function validatePrice(priceCents: unknown): InvalidInput | null {
  return isValidCents(priceCents)
    ? null
    : invalidInput("priceCents must be a non-negative integer", "priceCents");
}

function validateNotes(notes: string | null | undefined): InvalidInput | null {
  return notes && notes.length > MAX_NOTES_LENGTH
    ? invalidInput(`notes must be at most ${MAX_NOTES_LENGTH} characters`, "notes")
    : null;
}

type StatusEvent = Exclude<ReservationEvent, "amend">;

const ACTIONS: Record<StatusEvent, ReservationAction> = {
  confirm: "reservation.confirm",
  cancel: "reservation.cancel",
  complete: "reservation.complete",
};

function sameTerms(a: ReservationTerms, b: ReservationTerms): boolean {
  if (a.type !== b.type || a.start.getTime() !== b.start.getTime()) return false;
  return a.type === "sale" || b.type === "sale" || a.end.getTime() === b.end.getTime();
}

/**
 * The only writer of availability and reservation status.
 *
 * Every mutation runs in the vehicle's critical section, re-derives availability from the
 * ledger, stores it when it moved, then emits one audit event.
 */
export class ReservationCoordinator {
  private readonly registry: VehicleRegistry;
  private readonly ledger: ReservationLedger;
  private readonly lock: VehicleLock;
  private readonly audit: AuditSink;
  private readonly clock: Clock;
  private readonly validator: OverlapValidator;
  private readonly allowMidTermCancel: boolean;

  constructor(deps: CoordinatorDeps) {
    this.registry = deps.registry;
    this.ledger = deps.ledger;
    this.lock = deps.lock;
    this.audit = deps.audit;
    this.clock = deps.clock;
    this.allowMidTermCancel = deps.allowMidTermCancel ?? false;
    this.validator = new OverlapValidator(deps.registry, deps.ledger);
  }

  // ---------- reads (no lock) ----------

  async getVehicle(vehicleId: string): Promise<Result<Vehicle, NotFound>> {
    const vehicle = await this.registry.get(vehicleId);
    return vehicle ? ok(vehicle) : fail(notFound("vehicle", vehicleId));
  }

  async getReservation(reservationId: string): Promise<Result<Reservation, NotFound>> {
    const r = await this.ledger.get(reservationId);
    return r ? ok(r) : fail(notFound("reservation", reservationId));
  }

  listVehicles(filter: VehicleFilter = {}): Promise<Page<Vehicle>> {
    return this.registry.list(filter);
  }

  listReservations(filter: ReservationFilter = {}): Promise<Page<Reservation>> {
    return this.ledger.list(filter);
  }

  async findActiveByVehicle(vehicleId: string): Promise<Result<Reservation[], NotFound>> {
    const vehicle = await this.registry.get(vehicleId);
    if (!vehicle) return fail(notFound("vehicle", vehicleId));
    return ok(await this.ledger.findActiveByVehicle(vehicleId));
  }

  // ---------- mutations ----------

  async requestReservation(
    req: ReservationRequest
  ): Promise<Result<Reservation, NotFound | Conflict | InvalidInput | Busy>> {
    const now = this.clock.now();
    if (!req.vehicleId) return fail(invalidInput("vehicleId is required", "vehicleId"));
    if (!req.userId) return fail(invalidInput("userId is required", "userId"));
    const terms = validateTerms(req.terms, now);
    if (!terms.ok) return terms;
    const bad = validatePrice(req.priceCents) ?? validateNotes(req.notes);
    if (bad) return fail(bad);
    const wanted = terms.value;

    return this.serialized(req.vehicleId, async (): Promise<Result<Reservation, NotFound | Conflict>> => {
      const admissible = await this.validator.isAdmissible(req.vehicleId, wanted);
      if (!admissible.ok) {
        this.rejected("reservation.request", admissible.error, { vehicleId: req.vehicleId, userId: req.userId });
        return admissible;
      }
      const before = admissible.value.availability;

      // a sale holds the vehicle before the record exists; undone if the write fails
      const holds = wanted.type === "sale" && before !== "reserved";
      if (holds) await this.registry.setAvailability(req.vehicleId, "reserved");

      let created: Reservation;
      try {
        created = await this.ledger.create({
          ...wanted,
          vehicleId: req.vehicleId,
          userId: req.userId,
          priceCents: req.priceCents,
          notes: req.notes ?? null,
        });
      } catch (err) {
        if (holds) await this.registry.setAvailability(req.vehicleId, before);
        throw err;
      }

      const to = await this.reconcile(req.vehicleId, holds ? "reserved" : before);
      await this.record("reservation.request", req.userId, created, null, { from: before, to });
      return ok(created);
    });
  }

  async confirm(
    reservationId: string,
    actorId: string
  ): Promise<Result<Reservation, NotFound | InvalidTransition | Busy>> {
    return this.transition(reservationId, actorId, "confirm", (r, now) => {
      if (r.type !== "rental" || r.status !== "pending") return null;
      return now.getTime() >= r.end.getTime()
        ? `the rental window ended at ${r.end.toISOString()}`
        : null;
    });
  }

  async cancel(
    reservationId: string,
    actorId: string,
    opts: CancelOptions = {}
  ): Promise<Result<Reservation, NotFound | InvalidTransition | Busy>> {
    const allowMidTerm = opts.allowMidTerm ?? this.allowMidTermCancel;
    return this.transition(reservationId, actorId, "cancel", (r, now) => {
      // mid-term applies to rentals only
      if (r.type !== "rental" || r.status !== "confirmed" || allowMidTerm) return null;
      return now.getTime() >= r.start.getTime()
        ? "the rental has already started and mid-term cancellation is not allowed"
        : null;
    });
  }

  async complete(
    reservationId: string,
    actorId: string
  ): Promise<Result<Reservation, NotFound | InvalidTransition | Busy>> {
    return this.transition(reservationId, actorId, "complete", (r, now) => {
      if (r.type !== "rental" || r.status !== "confirmed") return null;
      return now.getTime() < r.end.getTime()
        ? `the rental runs until ${r.end.toISOString()}`
        : null;
    });
  }

  /** Edits a pending reservation; changed terms must still be admissible next to the others. */
  async amend(
    reservationId: string,
    actorId: string,
    input: AmendInput
  ): Promise<Result<Reservation, NotFound | InvalidInput | Conflict | InvalidTransition | Busy>> {
    const found = await this.ledger.get(reservationId);
    if (!found) return fail(notFound("reservation", reservationId));

    type AmendFailure = NotFound | InvalidInput | Conflict | InvalidTransition;
    return this.serialized(found.vehicleId, async (): Promise<Result<Reservation, AmendFailure>> => {
      const current = await this.ledger.get(reservationId);
      if (!current) return fail(notFound("reservation", reservationId));
      if (current.status !== "pending") {
        return fail(invalidTransition(current.status, "amend", "only pending reservations can be amended"));
      }

      const now = this.clock.now();
      const terms = validateTerms(
        {
          type: current.type,
          start: input.start ?? current.start,
          end: input.end ?? (current.type === "rental" ? current.end : undefined),
        },
        now
      );
      if (!terms.ok) return terms;
      const bad =
        (input.priceCents !== undefined ? validatePrice(input.priceCents) : null) ??
        validateNotes(input.notes);
      if (bad) return fail(bad);

      const patch: ReservationPatch = {};
      if (!sameTerms(terms.value, termsOf(current))) {
        const admissible = await this.validator.isAdmissible(current.vehicleId, terms.value, {
          exclude: current.id,
        });
        if (!admissible.ok) {
          this.rejected("reservation.amend", admissible.error, { reservationId, vehicleId: current.vehicleId });
          return admissible;
        }
        patch.terms = terms.value;
      }
      if (input.priceCents !== undefined) patch.priceCents = input.priceCents;
      if (input.notes !== undefined) patch.notes = input.notes;

      const vehicle = await this.registry.get(current.vehicleId);
      const updated = await this.ledger.update(reservationId, patch);
      if (!updated) return fail(notFound("reservation", reservationId));

      const before = vehicle?.availability ?? "available";
      const to = await this.reconcile(current.vehicleId, before);
      await this.record("reservation.amend", actorId, updated, current.status, { from: before, to });
      return ok(updated);
    });
  }

  /** Re-derives and stores one vehicle's availability; used by the periodic sweep. */
  async refreshAvailability(vehicleId: string): Promise<Result<AvailabilityChange, NotFound | Busy>> {
    return this.serialized(vehicleId, async (): Promise<Result<AvailabilityChange, NotFound>> => {
      const vehicle = await this.registry.get(vehicleId);
      if (!vehicle) return fail(notFound("vehicle", vehicleId));
      const to = await this.reconcile(vehicleId, vehicle.availability);
      if (to !== vehicle.availability) {
        logger.info("availability.refreshed", { vehicleId, from: vehicle.availability, to });
      }
      return ok({ vehicleId, from: vehicle.availability, to });
    });
  }

  /** Refreshes every vehicle with active reservations. One vehicle failing does not stop the rest. */
  async sweepAvailability(): Promise<SweepSummary> {
    const summary: SweepSummary = { checked: 0, changed: 0, busy: 0, failed: 0 };
    for (const vehicleId of await this.ledger.vehicleIdsWithActive()) {
      summary.checked += 1;
      try {
        const res = await this.refreshAvailability(vehicleId);
        if (!res.ok) {
          if (res.error.kind === "Busy") summary.busy += 1;
          continue;
        }
        if (res.value.from !== res.value.to) summary.changed += 1;
      } catch (err) {
        summary.failed += 1;
        logger.error("availability.sweep_failed", {
          vehicleId,
          message: errorMessage(err),
        });
      }
    }
    return summary;
  }

  // ---------- internals ----------

  private async transition(
    reservationId: string,
    actorId: string,
    event: StatusEvent,
    guard: (r: Reservation, now: Date) => string | null
  ): Promise<Result<Reservation, NotFound | InvalidTransition | Busy>> {
    const found = await this.ledger.get(reservationId);
    if (!found) return fail(notFound("reservation", reservationId));

    return this.serialized(found.vehicleId, async (): Promise<Result<Reservation, NotFound | InvalidTransition>> => {
      // re-read: the status may have moved while we waited for the lock
      const current = await this.ledger.get(reservationId);
      if (!current) return fail(notFound("reservation", reservationId));

      const next = nextStatus(current.status, event);
      const blocked = next ? guard(current, this.clock.now()) : null;
      if (!next || blocked) {
        const failure = invalidTransition(current.status, event, blocked ?? undefined);
        this.rejected(ACTIONS[event], failure, { reservationId, vehicleId: current.vehicleId });
        return fail(failure);
      }

      const vehicle = await this.registry.get(current.vehicleId);
      const outcome = await this.ledger.setStatus(reservationId, next);
      if (outcome === "not_found") return fail(notFound("reservation", reservationId));
      if (outcome === "invalid_transition") return fail(invalidTransition(current.status, event));

      const updated = await this.ledger.get(reservationId);
      if (!updated) return fail(notFound("reservation", reservationId));

      const before = vehicle?.availability ?? "available";
      const to = await this.reconcile(current.vehicleId, before);
      await this.record(ACTIONS[event], actorId, updated, current.status, { from: before, to });
      return ok(updated);
    });
  }

  private serialized<T, E extends EngineFailure>(
    vehicleId: string,
    fn: () => Promise<Result<T, E>>
  ): Promise<Result<T, E | Busy>> {
    return serializeOnVehicle(this.lock, vehicleId, fn);
  }

  /** Derives availability from the ledger and writes it when it differs from `stored`. */
  private async reconcile(vehicleId: string, stored: Availability): Promise<Availability> {
    const [completedSale, active] = await Promise.all([
      this.ledger.findCompletedSale(vehicleId),
      this.ledger.findActiveByVehicle(vehicleId),
    ]);
    const next = deriveAvailability({ completedSale, active, now: this.clock.now() });
    if (next !== stored) await this.registry.setAvailability(vehicleId, next);
    return next;
  }

  private async record(
    action: ReservationAction,
    actorId: string,
    r: Reservation,
    oldStatus: Reservation["status"] | null,
    availability: { from: Availability; to: Availability }
  ) {
    logger.info(action, {
      reservationId: r.id,
      vehicleId: r.vehicleId,
      actorId,
      type: r.type,
      from: oldStatus,
      to: r.status,
      availabilityFrom: availability.from,
      availabilityTo: availability.to,
    });
    await this.audit.emit({
      timestamp: this.clock.now(),
      actorId,
      action,
      vehicleId: r.vehicleId,
      reservationId: r.id,
      oldStatus,
      newStatus: r.status,
      ...(availability.from !== availability.to ? { availability } : {}),
    });
  }

  private rejected(action: ReservationAction, failure: EngineFailure, context: Record<string, string>) {
    logger.info(`${action}.rejected`, { ...context, kind: failure.kind, message: failure.message });
  }
}
