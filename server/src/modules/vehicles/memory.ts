import {
  emptyAvailabilityCounts,
  pageParams,
  type InventoryStats,
  type NewVehicle,
  type Page,
  type Range,
  type Vehicle,
  type VehicleFilter,
  type VehicleInventory,
  type VehiclePatch,
} from "./types.js";
import type { Availability } from "../../domain/enums.js";
import { newEntityId } from "../../utils/ids.js";

const containsCI = (haystack: string | null, needle: string) =>
  haystack !== null && haystack.toLowerCase().includes(needle.trim().toLowerCase());

const inRange = (value: number | null, range?: Range) => {
  if (!range || (range.min === undefined && range.max === undefined)) return true;
  if (value === null) return false;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
};

export function matchesVehicleFilter(v: Vehicle, filter: VehicleFilter): boolean {
  if (!filter.includeInactive && !v.active) return false;
  if (filter.make && !containsCI(v.make, filter.make)) return false;
  if (filter.model && !containsCI(v.model, filter.model)) return false;
  if (filter.color && !containsCI(v.color, filter.color)) return false;
  if (filter.powertrain && !containsCI(v.powertrain, filter.powertrain)) return false;
  if (filter.availability && v.availability !== filter.availability) return false;
  if (!inRange(v.priceCents, filter.priceRange)) return false;
  if (!inRange(v.year, filter.yearRange)) return false;
  if (filter.maxMileage !== undefined && (v.mileage === null || v.mileage > filter.maxMileage)) {
    return false;
  }
  const term = filter.search?.trim();
  if (term) {
    const fields = [v.make, v.model, v.color, v.powertrain, v.description];
    if (!fields.some((f) => containsCI(f, term))) return false;
  }
  return true;
}

/**
 * In-process vehicle store for tests and `STORE_DRIVER=memory`.
 * Returns copies so callers never mutate stored records.
 */
export class MemoryVehicleRegistry implements VehicleInventory {
  private readonly rows = new Map<string, Vehicle>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Insert a fully-formed record (fixtures, seeding). */
  put(vehicle: Vehicle): Vehicle {
    this.rows.set(vehicle.id, { ...vehicle });
    return { ...vehicle };
  }

  async get(vehicleId: string): Promise<Vehicle | null> {
    const v = this.rows.get(vehicleId);
    return v ? { ...v } : null;
  }

  async setAvailability(vehicleId: string, state: Availability): Promise<boolean> {
    const v = this.rows.get(vehicleId);
    if (!v) return false;
    if (v.availability !== state) {
      this.rows.set(vehicleId, { ...v, availability: state, updatedAt: this.now() });
    }
    return true;
  }

  async list(filter: VehicleFilter = {}): Promise<Page<Vehicle>> {
    const { page, limit, skip } = pageParams(filter);
    const matched = [...this.rows.values()]
      .filter((v) => matchesVehicleFilter(v, filter))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? 1 : -1));
    return {
      page,
      limit,
      total: matched.length,
      items: matched.slice(skip, skip + limit).map((v) => ({ ...v })),
    };
  }

  async create(input: NewVehicle): Promise<Vehicle> {
    const at = new Date(this.now().getTime() + this.seq++); // keep creation order strict
    return this.put({
      ...input,
      id: newEntityId(),
      active: true,
      availability: "available",
      createdAt: at,
      updatedAt: at,
    });
  }

  async update(vehicleId: string, patch: VehiclePatch): Promise<Vehicle | null> {
    const v = this.rows.get(vehicleId);
    if (!v) return null;
    return this.put({ ...v, ...patch, updatedAt: this.now() });
  }

  async setActive(vehicleId: string, active: boolean): Promise<Vehicle | null> {
    const v = this.rows.get(vehicleId);
    if (!v) return null;
    return this.put({ ...v, active, updatedAt: this.now() });
  }

  async findDuplicate(
    identity: Pick<Vehicle, "make" | "model" | "color" | "powertrain">
  ): Promise<Vehicle | null> {
    for (const v of this.rows.values()) {
      if (
        v.active &&
        v.make === identity.make &&
        v.model === identity.model &&
        v.color === identity.color &&
        v.powertrain === identity.powertrain
      ) {
        return { ...v };
      }
    }
    return null;
  }

  async stats(): Promise<InventoryStats> {
    const active = [...this.rows.values()].filter((v) => v.active);
    const byAvailability = emptyAvailabilityCounts();
    const makes = new Map<string, number>();
    for (const v of active) {
      byAvailability[v.availability] += 1;
      makes.set(v.make, (makes.get(v.make) ?? 0) + 1);
    }
    const prices = active.map((v) => v.priceCents);
    const sum = prices.reduce((a, b) => a + b, 0);
    return {
      total: active.length,
      byAvailability,
      byMake: [...makes.entries()]
        .map(([make, count]) => ({ make, count }))
        .sort((a, b) => b.count - a.count || a.make.localeCompare(b.make))
        .slice(0, 10),
      averagePriceCents: active.length ? Math.round(sum / active.length) : 0,
      priceRangeCents: {
        min: prices.length ? Math.min(...prices) : 0,
        max: prices.length ? Math.max(...prices) : 0,
      },
    };
  }
}
