import mongoose from "mongoose";

import { AuditLog } from "./model.js";
import { logger } from "../../config/logger.js";
import type { Availability, ReservationStatus } from "../../domain/enums.js";
import { errorMessage } from "../../utils/http.js";

export type ReservationAction =
  | "reservation.request"
  | "reservation.confirm"
  | "reservation.cancel"
  | "reservation.complete"
  | "reservation.amend";

/** One per successful coordinator mutation. */
export type AuditEvent = {
  timestamp: Date;
  actorId: string;
  action: ReservationAction;
  vehicleId: string;
  reservationId: string;
  oldStatus: ReservationStatus | null; // null on creation
  newStatus: ReservationStatus;
  availability?: { from: Availability; to: Availability };
};

export interface AuditSink {
  emit(event: AuditEvent): Promise<void>;
}

/** Writes events to the AuditLog collection. Best-effort: failures are logged, not raised. */
export const mongoAuditSink: AuditSink = {
  async emit(event) {
    try {
      await AuditLog.create({
        actorId: event.actorId,
        action: event.action,
        at: event.timestamp,
        target: { type: "vehicle", id: new mongoose.Types.ObjectId(event.vehicleId) },
        diff: {
          reservationId: event.reservationId,
          statusFrom: event.oldStatus,
          statusTo: event.newStatus,
          ...(event.availability
            ? { availabilityFrom: event.availability.from, availabilityTo: event.availability.to }
            : {}),
        },
      });
    } catch (err) {
      logger.warn("audit.write_failed", {
        action: event.action,
        reservationId: event.reservationId,
        message: errorMessage(err),
      });
    }
  },
};

/** For the memory driver: events go to the application log only. */
export const logAuditSink: AuditSink = {
  async emit(event) {
    logger.info("audit", { ...event, timestamp: event.timestamp.toISOString() });
  },
};
