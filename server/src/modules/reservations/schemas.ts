// server/src/modules/reservations/schemas.ts
import { z } from "zod";

import { MAX_NOTES_LENGTH } from "./coordinator.js";
import type { Reservation, ReservationStats } from "./types.js";
import { RESERVATION_STATUSES, TRANSACTION_TYPES } from "../../domain/enums.js";
import { fromCents, toCents } from "../../domain/money.js";

const objectId = z.string().regex(/^[0-9a-f]{24}$/i, "Invalid id");
const finalPrice = z.number().finite().nonnegative().transform((n) => toCents(n));
const notes = z.string().max(MAX_NOTES_LENGTH).nullable();

/**
 * POST /reservations. The requesting user comes from the token, never the body.
 * Window ordering is the engine's call (it answers with INVALID_INPUT).
 */
export const CreateReservationSchema = z
  .object({
    vehicleId: objectId,
    type: z.enum(TRANSACTION_TYPES),
    start: z.coerce.date().optional(),
    end: z.coerce.date().optional(),
    finalPrice,
    notes: notes.optional(),
  })
  .strict();

export const AmendReservationSchema = z
  .object({
    start: z.coerce.date().optional(),
    end: z.coerce.date().optional(),
    finalPrice: finalPrice.optional(),
    notes: notes.optional(),
  })
  .strict()
  .refine((o) => Object.keys(o).length > 0, { message: "Nothing to update" });

export const CancelReservationSchema = z
  .object({ allowMidTerm: z.boolean().optional() })
  .strict()
  .default({});

export const PageQuery = z.object({
  page: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const ReservationListQuery = PageQuery.extend({
  status: z.enum(RESERVATION_STATUSES).optional(),
  type: z.enum(TRANSACTION_TYPES).optional(),
  vehicleId: objectId.optional(),
});

export const VehicleIdParam = objectId;

export const UpcomingQuery = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

/** API shape: decimal price; sales carry `end: null`. */
export function toPublicReservation(r: Reservation) {
  return {
    id: r.id,
    vehicleId: r.vehicleId,
    userId: r.userId,
    type: r.type,
    status: r.status,
    start: r.start,
    end: r.type === "rental" ? r.end : null,
    finalPrice: fromCents(r.priceCents),
    notes: r.notes,
    createdAt: r.createdAt,
    updatedAt: r.updatedAt,
  };
}

export function toPublicStats(stats: ReservationStats) {
  return {
    byStatus: stats.byStatus,
    byType: stats.byType,
    monthlyRevenue: stats.monthlyRevenue.map((m) => ({ month: m.month, revenue: fromCents(m.revenueCents) })),
    totalRevenue: fromCents(stats.totalRevenueCents),
  };
}
