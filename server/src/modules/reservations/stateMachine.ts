/**
 * Reservation status machine.
 *
 * ```
 * pending ──confirm──▶ confirmed ──complete──▶ completed
 *    │                     │
 *    └──────cancel─────────┴──cancel──▶ cancelled
 * ```
 *
 * Only structural legality lives here. Time and policy guards (mid-term cancellation, rental
 * end reached) need a clock and belong to the coordinator.
 */
import {
  RESERVATION_STATUSES,
  type ReservationEvent,
  type ReservationStatus,
} from "../../domain/enums.js";

const TRANSITIONS: Record<ReservationStatus, Partial<Record<ReservationEvent, ReservationStatus>>> = {
  pending: { confirm: "confirmed", cancel: "cancelled" },
  confirmed: { cancel: "cancelled", complete: "completed" },
  cancelled: {},
  completed: {},
};

export const INITIAL_STATUS: ReservationStatus = "pending";

/** Target status for `event` from `from`, or null when the transition is not allowed. */
export function nextStatus(from: ReservationStatus, event: ReservationEvent): ReservationStatus | null {
  return TRANSITIONS[from][event] ?? null;
}

export function canTransition(from: ReservationStatus, to: ReservationStatus): boolean {
  return Object.values(TRANSITIONS[from]).includes(to);
}

/** Statuses that may legally move to `to`. */
export function sourcesOf(to: ReservationStatus): ReservationStatus[] {
  return RESERVATION_STATUSES.filter((from) => canTransition(from, to));
}

export function isTerminal(status: ReservationStatus): boolean {
  return Object.keys(TRANSITIONS[status]).length === 0;
}
