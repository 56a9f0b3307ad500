import type { ReservationStatus, TransactionType } from "../../domain/enums.js";
import type { MoneyCents } from "../../domain/money.js";
import type { Page } from "../vehicles/types.js";

/** A sale has a hand-over instant and no end; a rental is the half-open window [start, end). */
export type SaleTerms = { type: "sale"; start: Date };
export type RentalTerms = { type: "rental"; start: Date; end: Date };
export type ReservationTerms = SaleTerms | RentalTerms;

type ReservationBase = {
  id: string;
  vehicleId: string;
  userId: string;
  priceCents: MoneyCents; // stored exactly as given
  notes: string | null;
  status: ReservationStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type SaleReservation = ReservationBase & SaleTerms;
export type RentalReservation = ReservationBase & RentalTerms;
export type Reservation = SaleReservation | RentalReservation;

type Assigned = "id" | "status" | "createdAt" | "updatedAt";

/** What the ledger needs to append a reservation; identity and status are its own. */
export type ReservationDraft = Omit<ReservationBase, Assigned> & ReservationTerms;

export type ReservationPatch = {
  terms?: ReservationTerms;
  priceCents?: MoneyCents;
  notes?: string | null;
};

export type ReservationFilter = {
  userId?: string;
  vehicleId?: string;
  status?: ReservationStatus;
  type?: TransactionType;
  startFrom?: Date; // inclusive
  startTo?: Date; // inclusive
  /** Defaults to newest first. */
  sort?: ReservationSort;
  page?: number;
  limit?: number;
};

export type ReservationSort = "newest" | "startAsc";

export type SetStatusOutcome = "ok" | "not_found" | "invalid_transition";

export function termsOf(r: Reservation): ReservationTerms {
  return r.type === "rental"
    ? { type: "rental", start: r.start, end: r.end }
    : { type: "sale", start: r.start };
}

export type StatusCounts = Record<ReservationStatus, number>;
export type TypeCounts = Record<TransactionType, number>;

/** Statuses whose price counts as revenue. */
export const REVENUE_STATUSES = ["confirmed", "completed"] as const satisfies readonly ReservationStatus[];

export type MonthlyRevenue = { month: string; revenueCents: number }; // month is "YYYY-MM" (UTC)

export type ReservationStats = {
  byStatus: StatusCounts;
  byType: TypeCounts;
  /** Revenue by creation month since the cutoff, oldest month first. */
  monthlyRevenue: MonthlyRevenue[];
  totalRevenueCents: number;
};

/** Append-only reservation store. Records are never removed; terminal statuses end them. */
export interface ReservationLedger {
  create(draft: ReservationDraft): Promise<Reservation>;
  get(reservationId: string): Promise<Reservation | null>;
  /** Pending and confirmed reservations on a vehicle, by start ascending then creation order. */
  findActiveByVehicle(vehicleId: string): Promise<Reservation[]>;
  findCompletedSale(vehicleId: string): Promise<Reservation | null>;
  /** Applies the status machine; the write only lands if the stored status still allows it. */
  setStatus(reservationId: string, next: ReservationStatus): Promise<SetStatusOutcome>;
  update(reservationId: string, patch: ReservationPatch): Promise<Reservation | null>;
  list(filter?: ReservationFilter): Promise<Page<Reservation>>;
  countByStatus(userId?: string): Promise<StatusCounts>;
  /** Counts over every reservation; revenue only from reservations created at or after `since`. */
  statistics(since: Date): Promise<ReservationStats>;
  vehicleIdsWithActive(): Promise<string[]>;
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, confirmed: 0, cancelled: 0, completed: 0 };
}

export function emptyTypeCounts(): TypeCounts {
  return { sale: 0, rental: 0 };
}

export function isRevenueStatus(status: ReservationStatus): boolean {
  return status === "confirmed" || status === "completed";
}

