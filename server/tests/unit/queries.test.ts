import { describe, expect, it } from "vitest";

import type { ReservationStatus } from "../../src/domain/enums.js";
import { MemoryReservationLedger } from "../../src/modules/reservations/memory.js";
import { ReservationQueries } from "../../src/modules/reservations/queries.js";
import { MemoryVehicleRegistry } from "../../src/modules/vehicles/memory.js";
import { fixedClock } from "../../src/utils/dates.js";
import { newEntityId } from "../../src/utils/ids.js";
import { NOW, at, errorOf, makeVehicle, rental, setupEngine, valueOf } from "../support/engine.js";

const MINUTE = 60_000;

// direct ledger writes, walking the status machine to `status`
function ledgerFixture() {
  const clock = fixedClock(NOW);
  const ledger = new MemoryReservationLedger(() => clock.now());
  const registry = new MemoryVehicleRegistry(() => clock.now());
  const vehicle = registry.put(makeVehicle());
  const queries = new ReservationQueries(ledger, registry, clock);

  const PATH: Record<ReservationStatus, ReservationStatus[]> = {
    pending: [],
    confirmed: ["confirmed"],
    cancelled: ["cancelled"],
    completed: ["confirmed", "completed"],
  };

  async function add(opts: { type?: "sale" | "rental"; start: Date; priceCents: number; status: ReservationStatus }) {
    const base = { vehicleId: vehicle.id, userId: "u1", priceCents: opts.priceCents, notes: null };
    const r = await ledger.create(
      opts.type === "sale"
        ? { ...base, type: "sale", start: opts.start }
        : { ...base, type: "rental", start: opts.start, end: new Date(opts.start.getTime() + 30 * MINUTE) }
    );
    for (const step of PATH[opts.status]) await ledger.setStatus(r.id, step);
    return r;
  }

  return { clock, ledger, vehicle, queries, add };
}

async function seeded() {
  const engine = setupEngine();
  const { coordinator, vehicle } = engine;
  const book = async (userId: string, start: string, end: string) => {
    const r = valueOf(
      await coordinator.requestReservation({
        vehicleId: vehicle.id,
        userId,
        terms: rental(start, end),
        priceCents: 10_000,
      })
    );
    return valueOf(await coordinator.confirm(r.id, "seller-1"));
  };

  const early = await book("u1", "2030-02-03T00:00:00Z", "2030-02-05T00:00:00Z");
  const late = await book("u2", "2030-02-20T00:00:00Z", "2030-02-22T00:00:00Z");
  const middle = await book("u3", "2030-02-05T00:00:00Z", "2030-02-06T00:00:00Z");
  const queries = new ReservationQueries(engine.ledger, engine.registry, engine.clock);
  return { ...engine, queries, early, late, middle };
}

describe("ReservationQueries", () => {
  it("scopes client listings to their own reservations", async () => {
    const { queries, early } = await seeded();
    const mine = await queries.list({ userId: "u1", role: "client" }, { userId: "u2" });
    expect(mine.total).toBe(1);
    expect(mine.items[0].id).toBe(early.id);
    expect((await queries.list({ userId: "s1", role: "seller" })).total).toBe(3);
  });

  it("lets owners and sellers view a reservation", async () => {
    const { queries, early } = await seeded();
    expect(queries.canView({ userId: "u1", role: "client" }, early)).toBe(true);
    expect(queries.canView({ userId: "u2", role: "client" }, early)).toBe(false);
    expect(queries.canView({ userId: "s1", role: "seller" }, early)).toBe(true);
  });

  it("lists upcoming confirmed reservations soonest first", async () => {
    const { queries, early, middle, late } = await seeded();
    expect((await queries.upcoming()).map((r) => r.id)).toEqual([early.id, middle.id]);
    expect((await queries.upcoming(30)).map((r) => r.id)).toEqual([early.id, middle.id, late.id]);
  });

  it("builds a dashboard scoped to the viewer", async () => {
    const { queries, coordinator, late } = await seeded();
    valueOf(await coordinator.cancel(late.id, "u2"));

    expect(await queries.dashboard({ userId: "u2", role: "client" })).toEqual({
      vehicles: { total: 1, byAvailability: { available: 1, reserved: 0, sold: 0 } },
      reservations: { pending: 0, confirmed: 0, cancelled: 1, completed: 0 },
    });
    expect((await queries.dashboard({ userId: "s1", role: "seller" })).reservations).toEqual({
      pending: 0,
      confirmed: 2,
      cancelled: 1,
      completed: 0,
    });
  });

  it("returns the soonest upcoming reservations when more match than one page", async () => {
    const { queries, add } = ledgerFixture();
    const now = at(NOW).getTime();
    for (let i = 0; i < 105; i++) {
      await add({ start: new Date(now + i * MINUTE), priceCents: 1_000, status: "confirmed" });
    }

    const items = await queries.upcoming(7);
    expect(items).toHaveLength(100);
    expect(items[0].start).toEqual(at(NOW));
    expect(items[99].start).toEqual(new Date(now + 99 * MINUTE));
    expect(items.every((r, i) => i === 0 || items[i - 1].start.getTime() < r.start.getTime())).toBe(true);
  });

  it("lists a vehicle's full history, terminal reservations included", async () => {
    const { coordinator, vehicle, ledger, registry, clock } = setupEngine();
    const first = valueOf(
      await coordinator.requestReservation({
        vehicleId: vehicle.id,
        userId: "u1",
        terms: rental("2030-02-10T00:00:00Z", "2030-02-12T00:00:00Z"),
        priceCents: 10_000,
      })
    );
    valueOf(await coordinator.cancel(first.id, "u1"));
    const second = valueOf(
      await coordinator.requestReservation({
        vehicleId: vehicle.id,
        userId: "u2",
        terms: rental("2030-02-10T00:00:00Z", "2030-02-12T00:00:00Z"),
        priceCents: 10_000,
      })
    );
    const queries = new ReservationQueries(ledger, registry, clock);

    const history = valueOf(await queries.forVehicle(vehicle.id));
    expect(history.total).toBe(2);
    expect(history.items.map((r) => [r.id, r.status])).toEqual([
      [second.id, "pending"],
      [first.id, "cancelled"],
    ]);

    const missing = newEntityId();
    expect(errorOf(await queries.forVehicle(missing)).kind).toBe("NotFound");
  });

  it("summarizes counts and revenue over the last year", async () => {
    const { clock, queries, add } = ledgerFixture();
    const start = at("2030-04-01T00:00:00Z");

    clock.set("2029-01-15T00:00:00Z");
    await add({ start, priceCents: 50_000, status: "confirmed" }); // older than a year
    clock.set("2030-01-20T00:00:00Z");
    await add({ start, priceCents: 10_000, status: "confirmed" });
    clock.set("2030-02-01T00:00:00Z");
    await add({ type: "sale", start, priceCents: 2_000_000, status: "completed" });
    await add({ start, priceCents: 7_000, status: "pending" });
    await add({ start, priceCents: 3_000, status: "cancelled" });
    clock.set("2030-02-15T00:00:00Z");
    await add({ start, priceCents: 12_000, status: "completed" });
    clock.set("2030-03-10T00:00:00Z");

    expect(await queries.statistics()).toEqual({
      byStatus: { pending: 1, confirmed: 2, cancelled: 1, completed: 2 },
      byType: { sale: 1, rental: 5 },
      monthlyRevenue: [
        { month: "2030-01", revenueCents: 10_000 },
        { month: "2030-02", revenueCents: 2_012_000 },
      ],
      totalRevenueCents: 2_022_000,
    });
  });
});
