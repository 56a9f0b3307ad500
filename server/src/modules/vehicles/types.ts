import type { Availability } from "../../domain/enums.js";
import type { MoneyCents } from "../../domain/money.js";

export type Vehicle = {
  id: string;
  make: string;
  model: string;
  color: string;
  powertrain: string;
  priceCents: MoneyCents;
  mileage: number | null;
  year: number | null;
  description: string | null;
  imageUrl: string | null;
  active: boolean;
  availability: Availability;
  createdAt: Date;
  updatedAt: Date;
};

export type NewVehicle = Omit<Vehicle, "id" | "availability" | "active" | "createdAt" | "updatedAt">;

/** Inventory edits never carry availability; that belongs to the reservation coordinator. */
export type VehiclePatch = Partial<NewVehicle>;

export type Range = { min?: number; max?: number };

/** All fields optional and conjunctive. */
export type VehicleFilter = {
  make?: string;
  model?: string;
  color?: string;
  powertrain?: string;
  priceRange?: Range; // cents, inclusive
  yearRange?: Range; // inclusive
  maxMileage?: number;
  availability?: Availability;
  search?: string;
  includeInactive?: boolean;
  page?: number;
  limit?: number;
};

export type Page<T> = { page: number; limit: number; total: number; items: T[] };

export type InventoryStats = {
  total: number;
  byAvailability: Record<Availability, number>;
  byMake: Array<{ make: string; count: number }>;
  averagePriceCents: number;
  priceRangeCents: { min: number; max: number };
};

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function pageParams(filter: { page?: number; limit?: number }) {
  const page = Math.max(1, Math.floor(filter.page ?? 1));
  const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(filter.limit ?? DEFAULT_PAGE_SIZE)));
  return { page, limit, skip: (page - 1) * limit };
}

/** Read side of the vehicle store; the reservation engine needs nothing more. */
export interface VehicleRegistry {
  get(vehicleId: string): Promise<Vehicle | null>;
  /** Idempotent: writing the current state again succeeds. `false` means unknown vehicle. */
  setAvailability(vehicleId: string, state: Availability): Promise<boolean>;
  list(filter?: VehicleFilter): Promise<Page<Vehicle>>;
}

/** Full inventory store: registry plus attribute management. */
export interface VehicleInventory extends VehicleRegistry {
  create(input: NewVehicle): Promise<Vehicle>;
  update(vehicleId: string, patch: VehiclePatch): Promise<Vehicle | null>;
  setActive(vehicleId: string, active: boolean): Promise<Vehicle | null>;
  findDuplicate(
    identity: Pick<Vehicle, "make" | "model" | "color" | "powertrain">
  ): Promise<Vehicle | null>;
  stats(): Promise<InventoryStats>;
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function emptyAvailabilityCounts(): Record<Availability, number> {
  return { available: 0, reserved: 0, sold: 0 };
}
