/** Domain enums (string unions keep JSON clean and easy to index) */

export const AVAILABILITY = ["available", "reserved", "sold"] as const;
/** `reserved` covers both a vehicle out on rental and one held for a pending sale. */
export type Availability = (typeof AVAILABILITY)[number];

export const TRANSACTION_TYPES = ["sale", "rental"] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/** Reservation lifecycle; cancelled and completed are terminal */
export const RESERVATION_STATUSES = ["pending", "confirmed", "cancelled", "completed"] as const;
export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];

export const ACTIVE_STATUSES = ["pending", "confirmed"] as const satisfies readonly ReservationStatus[];
export type ActiveStatus = (typeof ACTIVE_STATUSES)[number];

export function isActiveStatus(s: ReservationStatus): s is ActiveStatus {
  return s === "pending" || s === "confirmed";
}

/** Status events, plus "amend" which edits a pending reservation without moving it. */
export type ReservationEvent = "confirm" | "cancel" | "complete" | "amend";

export const ROLES = ["client", "seller"] as const;
export type Role = (typeof ROLES)[number];
