import type { Reservation } from "./types.js";
import type { Availability } from "../../domain/enums.js";

export type AvailabilityInputs = {
  /** A completed sale on the vehicle, if any. */
  completedSale: Reservation | null;
  /** Pending and confirmed reservations on the vehicle. */
  active: readonly Reservation[];
  now: Date;
};

/**
 * Availability as a pure function of reservations:
 * sold after a completed sale; reserved while a sale is in flight or a confirmed rental has
 * started (until it is completed or cancelled); available otherwise.
 */
export function deriveAvailability({ completedSale, active, now }: AvailabilityInputs): Availability {
  if (completedSale) return "sold";
  for (const r of active) {
    if (r.status !== "pending" && r.status !== "confirmed") continue;
    if (r.type === "sale") return "reserved";
    if (r.status === "confirmed" && r.start.getTime() <= now.getTime()) return "reserved";
  }
  return "available";
}
