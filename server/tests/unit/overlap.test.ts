import { describe, expect, it } from "vitest";

import { OverlapValidator, findConflict, windowsOverlap } from "../../src/modules/reservations/overlap.js";
import { MemoryReservationLedger } from "../../src/modules/reservations/memory.js";
import type { Reservation } from "../../src/modules/reservations/types.js";
import { MemoryVehicleRegistry } from "../../src/modules/vehicles/memory.js";
import { newEntityId } from "../../src/utils/ids.js";
import { at, errorOf, makeVehicle, rental, valueOf } from "../support/engine.js";

const d = (day: number) => at(`2030-02-${String(day).padStart(2, "0")}T00:00:00.000Z`);

describe("windowsOverlap", () => {
  it("uses half-open intervals", () => {
    expect(windowsOverlap(d(10), d(20), d(20), d(25))).toBe(false);
    expect(windowsOverlap(d(20), d(25), d(10), d(20))).toBe(false);
    expect(windowsOverlap(d(10), d(20), d(19), d(25))).toBe(true);
    expect(windowsOverlap(d(10), d(20), d(12), d(14))).toBe(true);
    expect(windowsOverlap(d(12), d(14), d(10), d(20))).toBe(true);
  });
});

describe("findConflict", () => {
  const base = {
    vehicleId: "v1",
    userId: "u1",
    priceCents: 1,
    notes: null,
    createdAt: d(1),
    updatedAt: d(1),
  };
  const r1: Reservation = { ...base, id: "r1", status: "confirmed", type: "rental", start: d(10), end: d(15) };
  const r2: Reservation = { ...base, id: "r2", status: "pending", type: "rental", start: d(14), end: d(18) };

  it("returns the first blocking reservation in start order", () => {
    expect(findConflict([r1, r2], { type: "rental", start: d(12), end: d(16) })?.id).toBe("r1");
    expect(findConflict([r1, r2], { type: "rental", start: d(15), end: d(16) })?.id).toBe("r2");
    expect(findConflict([r1, r2], { type: "rental", start: d(18), end: d(20) })).toBeNull();
  });

  it("lets any active reservation block a sale", () => {
    expect(findConflict([r2], { type: "sale", start: d(1) })?.id).toBe("r2");
  });

  it("skips the excluded reservation", () => {
    expect(findConflict([r1, r2], { type: "rental", start: d(12), end: d(16) }, "r1")?.id).toBe("r2");
  });
});

describe("OverlapValidator", () => {
  it("returns the vehicle when admissible", async () => {
    const registry = new MemoryVehicleRegistry();
    const validator = new OverlapValidator(registry, new MemoryReservationLedger());
    const v = registry.put(makeVehicle());
    const res = await validator.isAdmissible(v.id, rental("2030-02-10T00:00:00Z", "2030-02-12T00:00:00Z"));
    expect(valueOf(res).id).toBe(v.id);
  });

  it("reports a sold vehicle without a witness when the sale record is missing", async () => {
    const registry = new MemoryVehicleRegistry();
    const validator = new OverlapValidator(registry, new MemoryReservationLedger());
    const v = registry.put(makeVehicle({ availability: "sold" }));
    expect(errorOf(await validator.isAdmissible(v.id, { type: "sale", start: d(1) }))).toEqual({
      kind: "Conflict",
      message: `Vehicle ${v.id} has been sold`,
    });
  });

  it("reports unknown vehicles", async () => {
    const validator = new OverlapValidator(new MemoryVehicleRegistry(), new MemoryReservationLedger());
    const id = newEntityId();
    expect(errorOf(await validator.isAdmissible(id, { type: "sale", start: d(1) })).kind).toBe("NotFound");
  });
});
