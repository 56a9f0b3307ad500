import { INITIAL_STATUS, canTransition } from "./stateMachine.js";
import {
  emptyStatusCounts,
  emptyTypeCounts,
  isRevenueStatus,
  type Reservation,
  type ReservationDraft,
  type ReservationFilter,
  type ReservationLedger,
  type ReservationPatch,
  type ReservationStats,
  type SetStatusOutcome,
  type StatusCounts,
} from "./types.js";
import { isActiveStatus, type ReservationStatus } from "../../domain/enums.js";
import { newEntityId } from "../../utils/ids.js";
import { pageParams, type Page } from "../vehicles/types.js";

// clones the Date fields too
function copy(r: Reservation): Reservation {
  const dates = {
    start: new Date(r.start.getTime()),
    createdAt: new Date(r.createdAt.getTime()),
    updatedAt: new Date(r.updatedAt.getTime()),
  };
  return r.type === "rental"
    ? { ...r, ...dates, end: new Date(r.end.getTime()) }
    : { ...r, ...dates };
}

const monthOf = (d: Date) => d.toISOString().slice(0, 7);

export function matchesReservationFilter(r: Reservation, filter: ReservationFilter): boolean {
  if (filter.userId && r.userId !== filter.userId) return false;
  if (filter.vehicleId && r.vehicleId !== filter.vehicleId) return false;
  if (filter.status && r.status !== filter.status) return false;
  if (filter.type && r.type !== filter.type) return false;
  if (filter.startFrom && r.start.getTime() < filter.startFrom.getTime()) return false;
  if (filter.startTo && r.start.getTime() > filter.startTo.getTime()) return false;
  return true;
}

/**
 * In-process ledger for tests and `STORE_DRIVER=memory`.
 * Rows are kept in insertion order, so a stable sort on start keeps creation order for ties.
 */
export class MemoryReservationLedger implements ReservationLedger {
  private readonly rows: Reservation[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  private find(id: string): number {
    return this.rows.findIndex((r) => r.id === id);
  }

  async create(draft: ReservationDraft): Promise<Reservation> {
    const at = this.now();
    const row: Reservation = {
      ...draft,
      id: newEntityId(),
      status: INITIAL_STATUS,
      createdAt: at,
      updatedAt: at,
    };
    this.rows.push(copy(row));
    return copy(row);
  }

  async get(reservationId: string): Promise<Reservation | null> {
    const i = this.find(reservationId);
    return i === -1 ? null : copy(this.rows[i]);
  }

  async findActiveByVehicle(vehicleId: string): Promise<Reservation[]> {
    return this.rows
      .filter((r) => r.vehicleId === vehicleId && isActiveStatus(r.status))
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .map(copy);
  }

  async findCompletedSale(vehicleId: string): Promise<Reservation | null> {
    const r = this.rows.find(
      (x) => x.vehicleId === vehicleId && x.type === "sale" && x.status === "completed"
    );
    return r ? copy(r) : null;
  }

  async setStatus(reservationId: string, next: ReservationStatus): Promise<SetStatusOutcome> {
    const i = this.find(reservationId);
    if (i === -1) return "not_found";
    const current = this.rows[i];
    if (!canTransition(current.status, next)) return "invalid_transition";
    this.rows[i] = { ...current, status: next, updatedAt: this.now() };
    return "ok";
  }

  async update(reservationId: string, patch: ReservationPatch): Promise<Reservation | null> {
    const i = this.find(reservationId);
    if (i === -1) return null;
    const current = this.rows[i];
    const base = {
      id: current.id,
      vehicleId: current.vehicleId,
      userId: current.userId,
      status: current.status,
      createdAt: current.createdAt,
      updatedAt: this.now(),
      priceCents: patch.priceCents ?? current.priceCents,
      notes: patch.notes !== undefined ? patch.notes : current.notes,
    };
    const terms = patch.terms ?? current;
    const next: Reservation =
      terms.type === "rental"
        ? { ...base, type: "rental", start: terms.start, end: terms.end }
        : { ...base, type: "sale", start: terms.start };
    this.rows[i] = copy(next);
    return copy(next);
  }

  async list(filter: ReservationFilter = {}): Promise<Page<Reservation>> {
    const { page, limit, skip } = pageParams(filter);
    const matched = this.rows.filter((r) => matchesReservationFilter(r, filter));
    if (filter.sort === "startAsc") {
      matched.sort((a, b) => a.start.getTime() - b.start.getTime()); // stable: creation order on ties
    } else {
      matched.reverse(); // newest first
    }
    return {
      page,
      limit,
      total: matched.length,
      items: matched.slice(skip, skip + limit).map(copy),
    };
  }

  async countByStatus(userId?: string): Promise<StatusCounts> {
    const counts = emptyStatusCounts();
    for (const r of this.rows) {
      if (userId && r.userId !== userId) continue;
      counts[r.status] += 1;
    }
    return counts;
  }

  async statistics(since: Date): Promise<ReservationStats> {
    const byStatus = emptyStatusCounts();
    const byType = emptyTypeCounts();
    const months = new Map<string, number>();
    for (const r of this.rows) {
      byStatus[r.status] += 1;
      byType[r.type] += 1;
      if (isRevenueStatus(r.status) && r.createdAt.getTime() >= since.getTime()) {
        const month = monthOf(r.createdAt);
        months.set(month, (months.get(month) ?? 0) + r.priceCents);
      }
    }
    const monthlyRevenue = [...months.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([month, revenueCents]) => ({ month, revenueCents }));
    return {
      byStatus,
      byType,
      monthlyRevenue,
      totalRevenueCents: monthlyRevenue.reduce((sum, m) => sum + m.revenueCents, 0),
    };
  }

  async vehicleIdsWithActive(): Promise<string[]> {
    const ids = new Set<string>();
    for (const r of this.rows) if (isActiveStatus(r.status)) ids.add(r.vehicleId);
    return [...ids];
  }
}
