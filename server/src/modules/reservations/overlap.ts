import type { Reservation, ReservationLedger, ReservationTerms } from "./types.js";
import { isActiveStatus } from "../../domain/enums.js";
import {
  conflict,
  fail,
  notFound,
  ok,
  type Conflict,
  type NotFound,
  type Result,
} from "../../domain/result.js";
import type { Vehicle, VehicleRegistry } from "../vehicles/types.js";

/** Half-open intervals: [10,20) and [20,30) do not overlap; [10,20) and [19,30) do. */
export function windowsOverlap(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart.getTime() < bEnd.getTime() && bStart.getTime() < aEnd.getTime();
}

/**
 * First active reservation that blocks `terms`, scanning in the order given (the ledger's
 * start-ascending order), or null.
 *
 * A sale is blocked by anything in flight. A rental is blocked by an active sale or by an
 * active rental whose window intersects its own.
 */
export function findConflict(
  active: readonly Reservation[],
  terms: ReservationTerms,
  exclude?: string
): Reservation | null {
  for (const r of active) {
    if (r.id === exclude || !isActiveStatus(r.status)) continue;
    if (terms.type === "sale" || r.type === "sale") return r;
    if (windowsOverlap(terms.start, terms.end, r.start, r.end)) return r;
  }
  return null;
}

function describe(r: Reservation): string {
  return r.type === "sale"
    ? `sale reservation ${r.id} (${r.status})`
    : `rental reservation ${r.id} [${r.start.toISOString()}, ${r.end.toISOString()}) (${r.status})`;
}

export class OverlapValidator {
  constructor(
    private readonly registry: VehicleRegistry,
    private readonly ledger: ReservationLedger
  ) {}

  /**
   * Whether `terms` may be booked on the vehicle right now; on success, the vehicle as read.
   * Only meaningful inside the vehicle's critical section; outside it the answer can be stale
   * by the time it is used.
   */
  async isAdmissible(
    vehicleId: string,
    terms: ReservationTerms,
    opts: { exclude?: string } = {}
  ): Promise<Result<Vehicle, NotFound | Conflict>> {
    const vehicle = await this.registry.get(vehicleId);
    if (!vehicle || !vehicle.active) return fail(notFound("vehicle", vehicleId));

    if (vehicle.availability === "sold") {
      const sale = await this.ledger.findCompletedSale(vehicleId);
      return fail(conflict(`Vehicle ${vehicleId} has been sold`, sale?.id));
    }

    const active = await this.ledger.findActiveByVehicle(vehicleId);
    const hit = findConflict(active, terms, opts.exclude);
    if (hit) {
      return fail(conflict(`Vehicle ${vehicleId} is already held by ${describe(hit)}`, hit.id));
    }
    return ok(vehicle);
  }
}
