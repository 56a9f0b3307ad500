import type {
  Reservation,
  ReservationFilter,
  ReservationLedger,
  ReservationStats,
  StatusCounts,
} from "./types.js";
import type { Availability, Role } from "../../domain/enums.js";
import { fail, notFound, ok, type NotFound, type Result } from "../../domain/result.js";
import { addDays, type Clock } from "../../utils/dates.js";
import { MAX_PAGE_SIZE, type Page, type VehicleInventory } from "../vehicles/types.js";

export type Viewer = { userId: string; role: Role };

export type Dashboard = {
  vehicles: { total: number; byAvailability: Record<Availability, number> };
  reservations: StatusCounts;
};

export const DEFAULT_UPCOMING_DAYS = 7;
export const REVENUE_WINDOW_DAYS = 365;

/** Read-side views over the ledger, scoped to who is asking. */
export class ReservationQueries {
  constructor(
    private readonly ledger: ReservationLedger,
    private readonly inventory: VehicleInventory,
    private readonly clock: Clock
  ) {}

  /** Clients only ever see their own reservations; sellers see everything. */
  list(viewer: Viewer, filter: ReservationFilter = {}): Promise<Page<Reservation>> {
    const scoped = viewer.role === "client" ? { ...filter, userId: viewer.userId } : filter;
    return this.ledger.list(scoped);
  }

  canView(viewer: Viewer, r: Reservation): boolean {
    return viewer.role === "seller" || r.userId === viewer.userId;
  }

  /** Confirmed reservations starting within the next `days` days, soonest first. */
  async upcoming(days = DEFAULT_UPCOMING_DAYS): Promise<Reservation[]> {
    const now = this.clock.now();
    const page = await this.ledger.list({
      status: "confirmed",
      startFrom: now,
      startTo: addDays(now, days),
      sort: "startAsc",
      limit: MAX_PAGE_SIZE,
    });
    return page.items;
  }

  /** Every reservation on a vehicle, terminal ones included, newest first. */
  async forVehicle(
    vehicleId: string,
    paging: Pick<ReservationFilter, "page" | "limit"> = {}
  ): Promise<Result<Page<Reservation>, NotFound>> {
    const vehicle = await this.inventory.get(vehicleId);
    if (!vehicle) return fail(notFound("vehicle", vehicleId));
    return ok(await this.ledger.list({ ...paging, vehicleId }));
  }

  /** Status and type counts; revenue over the last year by creation month. */
  statistics(): Promise<ReservationStats> {
    return this.ledger.statistics(addDays(this.clock.now(), -REVENUE_WINDOW_DAYS));
  }

  async dashboard(viewer: Viewer): Promise<Dashboard> {
    const [stats, reservations] = await Promise.all([
      this.inventory.stats(),
      this.ledger.countByStatus(viewer.role === "client" ? viewer.userId : undefined),
    ]);
    return {
      vehicles: { total: stats.total, byAvailability: stats.byAvailability },
      reservations,
    };
  }
}
