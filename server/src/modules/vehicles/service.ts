import type { InventoryStats, NewVehicle, Vehicle, VehicleInventory, VehiclePatch } from "./types.js";
import { logger } from "../../config/logger.js";
import { isValidCents } from "../../domain/money.js";
import {
  conflict,
  fail,
  invalidInput,
  notFound,
  ok,
  type Busy,
  type Conflict,
  type InvalidInput,
  type NotFound,
  type Result,
} from "../../domain/result.js";
import { serializeOnVehicle, type VehicleLock } from "../locks/service.js";
import type { ReservationLedger } from "../reservations/types.js";

const MAX_TEXT = 255;

/** Trims, drops markup-ish characters, caps length. */
export function sanitizeText(text: string, max = MAX_TEXT): string {
  return text.trim().replace(/[<>"']/g, "").slice(0, max);
}

/** "land rover" -> "Land Rover", "MERCEDES-BENZ" -> "Mercedes-Benz" */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, pre: string, c: string) => pre + c.toUpperCase());
}

type Identity = Pick<Vehicle, "make" | "model" | "color" | "powertrain">;

function normalizeIdentity(input: Partial<Identity>): Partial<Identity> {
  const out: Partial<Identity> = {};
  if (input.make !== undefined) out.make = sanitizeText(titleCase(input.make));
  if (input.model !== undefined) out.model = sanitizeText(titleCase(input.model));
  if (input.color !== undefined) out.color = sanitizeText(input.color.toLowerCase());
  if (input.powertrain !== undefined) out.powertrain = sanitizeText(input.powertrain);
  return out;
}

function checkPrice(priceCents: number): InvalidInput | null {
  return isValidCents(priceCents) && priceCents > 0
    ? null
    : invalidInput("price must be greater than 0", "price");
}

/**
 * Attribute management for sellers. Availability is never written here; the reservation
 * coordinator owns it.
 */
export class InventoryService {
  constructor(
    private readonly inventory: VehicleInventory,
    private readonly ledger: ReservationLedger,
    private readonly lock: VehicleLock
  ) {}

  async createVehicle(input: NewVehicle): Promise<Result<Vehicle, InvalidInput | Conflict>> {
    const v: NewVehicle = {
      ...input,
      make: sanitizeText(titleCase(input.make)),
      model: sanitizeText(titleCase(input.model)),
      color: sanitizeText(input.color.toLowerCase()),
      powertrain: sanitizeText(input.powertrain),
      description: input.description !== null ? sanitizeText(input.description, 2000) : null,
    };
    if (!v.make) return fail(invalidInput("make is required", "make"));
    if (!v.model) return fail(invalidInput("model is required", "model"));
    const badPrice = checkPrice(v.priceCents);
    if (badPrice) return fail(badPrice);

    const dup = await this.inventory.findDuplicate({
      make: v.make,
      model: v.model,
      color: v.color,
      powertrain: v.powertrain,
    });
    if (dup) {
      return fail(conflict(`A matching vehicle already exists in inventory (${dup.id})`));
    }

    const created = await this.inventory.create(v);
    logger.info("vehicle.created", { vehicleId: created.id, make: created.make, model: created.model });
    return ok(created);
  }

  async updateVehicle(
    vehicleId: string,
    patch: VehiclePatch
  ): Promise<Result<Vehicle, NotFound | InvalidInput>> {
    const p: VehiclePatch = { ...patch, ...normalizeIdentity(patch) };
    if (p.make === "") return fail(invalidInput("make cannot be empty", "make"));
    if (p.model === "") return fail(invalidInput("model cannot be empty", "model"));
    if (p.priceCents !== undefined) {
      const badPrice = checkPrice(p.priceCents);
      if (badPrice) return fail(badPrice);
    }
    if (typeof p.description === "string") p.description = sanitizeText(p.description, 2000);

    const updated = await this.inventory.update(vehicleId, p);
    if (!updated) return fail(notFound("vehicle", vehicleId));
    logger.info("vehicle.updated", { vehicleId, fields: Object.keys(p) });
    return ok(updated);
  }

  /** Soft delete. Refused while the vehicle has pending or confirmed reservations. */
  async deactivateVehicle(vehicleId: string): Promise<Result<Vehicle, NotFound | Conflict | Busy>> {
    return serializeOnVehicle(
      this.lock,
      vehicleId,
      async (): Promise<Result<Vehicle, NotFound | Conflict>> => {
        const vehicle = await this.inventory.get(vehicleId);
        if (!vehicle) return fail(notFound("vehicle", vehicleId));

        const active = await this.ledger.findActiveByVehicle(vehicleId);
        if (active.length > 0) {
          return fail(
            conflict(`Vehicle ${vehicleId} has ${active.length} active reservation(s)`, active[0].id)
          );
        }
        if (!vehicle.active) return ok(vehicle);

        const updated = await this.inventory.setActive(vehicleId, false);
        if (!updated) return fail(notFound("vehicle", vehicleId));
        logger.info("vehicle.deactivated", { vehicleId });
        return ok(updated);
      }
    );
  }

  stats(): Promise<InventoryStats> {
    return this.inventory.stats();
  }
}
