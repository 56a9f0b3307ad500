import { describe, expect, it } from "vitest";

import { MemoryReservationLedger, matchesReservationFilter } from "../../src/modules/reservations/memory.js";
import type { ReservationDraft } from "../../src/modules/reservations/types.js";
import { MemoryVehicleRegistry, matchesVehicleFilter } from "../../src/modules/vehicles/memory.js";
import { buildVehicleQuery } from "../../src/modules/vehicles/registry.js";
import { fixedClock } from "../../src/utils/dates.js";
import { at, makeVehicle } from "../support/engine.js";

type DraftOverrides = { vehicleId?: string; userId?: string; start?: Date; end?: Date };

function draft(overrides: DraftOverrides = {}): ReservationDraft {
  return {
    vehicleId: overrides.vehicleId ?? "v1",
    userId: overrides.userId ?? "u1",
    priceCents: 100,
    notes: null,
    type: "rental",
    start: overrides.start ?? at("2030-02-10T00:00:00Z"),
    end: overrides.end ?? at("2030-02-12T00:00:00Z"),
  };
}

describe("MemoryVehicleRegistry", () => {
  it("treats setAvailability as idempotent and reports unknown ids", async () => {
    const clock = fixedClock("2030-02-01T00:00:00Z");
    const registry = new MemoryVehicleRegistry(() => clock.now());
    const v = registry.put(makeVehicle());

    clock.advance(1_000);
    expect(await registry.setAvailability(v.id, "available")).toBe(true);
    expect((await registry.get(v.id))?.updatedAt).toEqual(v.updatedAt);

    expect(await registry.setAvailability(v.id, "reserved")).toBe(true);
    expect((await registry.get(v.id))?.availability).toBe("reserved");
    expect(await registry.setAvailability("missing", "reserved")).toBe(false);
  });

  it("returns copies", async () => {
    const registry = new MemoryVehicleRegistry();
    const v = registry.put(makeVehicle());
    const copy = await registry.get(v.id);
    if (copy) copy.make = "Changed";
    expect((await registry.get(v.id))?.make).toBe("Toyota");
  });

  it("lists newest first, skips inactive vehicles and paginates", async () => {
    const registry = new MemoryVehicleRegistry(() => at("2030-02-01T00:00:00Z"));
    const a = await registry.create({ ...makeVehicle(), make: "Audi" });
    const b = await registry.create({ ...makeVehicle(), make: "Bmw" });
    const c = await registry.create({ ...makeVehicle(), make: "Citroen" });
    await registry.setActive(b.id, false);

    const page = await registry.list({ limit: 1, page: 2 });
    expect(page.total).toBe(2);
    expect(page.items.map((v) => v.id)).toEqual([a.id]);
    expect((await registry.list({})).items.map((v) => v.id)).toEqual([c.id, a.id]);
    expect((await registry.list({ includeInactive: true })).total).toBe(3);
  });

  it("finds active duplicates only", async () => {
    const registry = new MemoryVehicleRegistry();
    const v = registry.put(makeVehicle());
    const spec = { make: v.make, model: v.model, color: v.color, powertrain: v.powertrain };
    expect((await registry.findDuplicate(spec))?.id).toBe(v.id);
    await registry.setActive(v.id, false);
    expect(await registry.findDuplicate(spec)).toBeNull();
  });

  it("summarizes active inventory", async () => {
    const registry = new MemoryVehicleRegistry();
    registry.put(makeVehicle({ make: "Kia", priceCents: 1_000 }));
    registry.put(makeVehicle({ make: "Kia", priceCents: 3_000, availability: "reserved" }));
    registry.put(makeVehicle({ make: "Audi", priceCents: 2_000, availability: "sold" }));
    registry.put(makeVehicle({ make: "Audi", priceCents: 9_000, active: false }));

    const stats = await registry.stats();
    expect(stats.total).toBe(3);
    expect(stats.byAvailability).toEqual({ available: 1, reserved: 1, sold: 1 });
    expect(stats.byMake).toEqual([
      { make: "Kia", count: 2 },
      { make: "Audi", count: 1 },
    ]);
    expect(stats.averagePriceCents).toBe(2_000);
    expect(stats.priceRangeCents).toEqual({ min: 1_000, max: 3_000 });
  });
});

describe("matchesVehicleFilter", () => {
  const v = makeVehicle({ make: "Toyota", model: "Corolla", color: "white", year: 2022, mileage: 12_000, priceCents: 2_450_000 });

  it("matches case-insensitive substrings and inclusive ranges", () => {
    expect(matchesVehicleFilter(v, { make: "toy", color: "WHI" })).toBe(true);
    expect(matchesVehicleFilter(v, { priceRange: { min: 2_450_000, max: 2_450_000 } })).toBe(true);
    expect(matchesVehicleFilter(v, { yearRange: { min: 2023 } })).toBe(false);
    expect(matchesVehicleFilter(v, { maxMileage: 11_999 })).toBe(false);
    expect(matchesVehicleFilter(v, { search: "coro" })).toBe(true);
    expect(matchesVehicleFilter(v, { availability: "sold" })).toBe(false);
  });

  it("excludes vehicles without a year from a year range", () => {
    expect(matchesVehicleFilter({ ...v, year: null }, { yearRange: { max: 2030 } })).toBe(false);
  });
});

describe("buildVehicleQuery", () => {
  it("defaults to active vehicles", () => {
    expect(buildVehicleQuery({})).toEqual({ active: true });
  });

  it("escapes user text and combines ranges", () => {
    const q = buildVehicleQuery({
      make: "a+b",
      priceRange: { min: 100 },
      yearRange: { min: 2019, max: 2021 },
      maxMileage: 5_000,
      availability: "available",
      includeInactive: true,
    });
    expect(q).toEqual({
      make: /a\+b/i,
      priceCents: { $gte: 100 },
      year: { $gte: 2019, $lte: 2021 },
      mileage: { $lte: 5_000 },
      availability: "available",
    });
  });

  it("searches across text fields", () => {
    const q = buildVehicleQuery({ search: " golf " });
    expect(q.$or).toEqual([
      { make: /golf/i },
      { model: /golf/i },
      { color: /golf/i },
      { powertrain: /golf/i },
      { description: /golf/i },
    ]);
  });
});

describe("MemoryReservationLedger", () => {
  it("assigns identity and starts pending", async () => {
    const ledger = new MemoryReservationLedger(() => at("2030-02-01T00:00:00Z"));
    const r = await ledger.create(draft());
    expect(r.id).toMatch(/^[0-9a-f]{24}$/);
    expect(r.status).toBe("pending");
    expect(r.createdAt).toEqual(at("2030-02-01T00:00:00Z"));
  });

  it("hands out copies whose dates cannot move the stored window", async () => {
    const ledger = new MemoryReservationLedger(() => at("2030-02-01T00:00:00Z"));
    const input = draft();
    const r = await ledger.create(input);
    input.start.setTime(0);
    r.start.setTime(0);
    if (r.type === "rental") r.end.setTime(0);
    r.createdAt.setTime(0);

    const stored = await ledger.get(r.id);
    expect(stored?.start).toEqual(at("2030-02-10T00:00:00Z"));
    expect(stored?.type === "rental" && stored.end).toEqual(at("2030-02-12T00:00:00Z"));
    expect(stored?.createdAt).toEqual(at("2030-02-01T00:00:00Z"));
  });

  it("orders active reservations by start, then creation", async () => {
    const ledger = new MemoryReservationLedger();
    const late = await ledger.create(draft({ start: at("2030-02-20T00:00:00Z"), end: at("2030-02-21T00:00:00Z") }));
    const early1 = await ledger.create(draft());
    const early2 = await ledger.create(draft());
    const gone = await ledger.create(draft({ start: at("2030-01-01T00:00:00Z") }));
    await ledger.setStatus(gone.id, "cancelled");

    expect((await ledger.findActiveByVehicle("v1")).map((r) => r.id)).toEqual([early1.id, early2.id, late.id]);
  });

  it("applies the status machine on setStatus", async () => {
    const ledger = new MemoryReservationLedger();
    const r = await ledger.create(draft());
    expect(await ledger.setStatus(r.id, "completed")).toBe("invalid_transition");
    expect(await ledger.setStatus(r.id, "confirmed")).toBe("ok");
    expect(await ledger.setStatus(r.id, "completed")).toBe("ok");
    expect(await ledger.setStatus("missing", "cancelled")).toBe("not_found");
  });

  it("finds a completed sale", async () => {
    const ledger = new MemoryReservationLedger();
    const sale = await ledger.create({ vehicleId: "v1", userId: "u1", priceCents: 1, notes: null, type: "sale", start: at("2030-02-01T00:00:00Z") });
    expect(await ledger.findCompletedSale("v1")).toBeNull();
    await ledger.setStatus(sale.id, "confirmed");
    await ledger.setStatus(sale.id, "completed");
    expect((await ledger.findCompletedSale("v1"))?.id).toBe(sale.id);
    expect(await ledger.vehicleIdsWithActive()).toEqual([]);
  });

  it("updates terms, price and notes", async () => {
    const ledger = new MemoryReservationLedger();
    const r = await ledger.create(draft());
    const updated = await ledger.update(r.id, {
      terms: { type: "rental", start: at("2030-03-01T00:00:00Z"), end: at("2030-03-02T00:00:00Z") },
      notes: "moved",
    });
    expect(updated?.start).toEqual(at("2030-03-01T00:00:00Z"));
    expect(updated?.notes).toBe("moved");
    expect(updated?.priceCents).toBe(100);
    expect(await ledger.update("missing", { notes: "x" })).toBeNull();
  });

  it("lists newest first with filters and counts by status", async () => {
    const ledger = new MemoryReservationLedger();
    const a = await ledger.create(draft({ userId: "u1" }));
    const b = await ledger.create(draft({ userId: "u2" }));
    const c = await ledger.create(draft({ userId: "u1" }));
    await ledger.setStatus(a.id, "cancelled");

    expect((await ledger.list()).items.map((r) => r.id)).toEqual([c.id, b.id, a.id]);
    expect((await ledger.list({ userId: "u1" })).items.map((r) => r.id)).toEqual([c.id, a.id]);
    expect((await ledger.list({ status: "pending", limit: 1 })).total).toBe(2);
    expect(await ledger.countByStatus("u1")).toEqual({ pending: 1, confirmed: 0, cancelled: 1, completed: 0 });
    expect(await ledger.countByStatus()).toEqual({ pending: 2, confirmed: 0, cancelled: 1, completed: 0 });
  });

  it("filters by start bounds inclusively", () => {
    const r = { ...draft(), id: "r1", status: "pending" as const, createdAt: at("2030-01-01T00:00:00Z"), updatedAt: at("2030-01-01T00:00:00Z") };
    expect(matchesReservationFilter(r, { startFrom: at("2030-02-10T00:00:00Z") })).toBe(true);
    expect(matchesReservationFilter(r, { startTo: at("2030-02-09T23:59:59Z") })).toBe(false);
  });
});
