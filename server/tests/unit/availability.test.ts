import { describe, expect, it } from "vitest";

import { deriveAvailability } from "../../src/modules/reservations/availability.js";
import type { Reservation } from "../../src/modules/reservations/types.js";
import { at } from "../support/engine.js";

const base = {
  vehicleId: "v1",
  userId: "u1",
  priceCents: 100,
  notes: null,
  createdAt: at("2030-01-01T00:00:00Z"),
  updatedAt: at("2030-01-01T00:00:00Z"),
};

function rentalRow(id: string, status: Reservation["status"], start: string, end: string): Reservation {
  return { ...base, id, status, type: "rental", start: at(start), end: at(end) };
}

function saleRow(id: string, status: Reservation["status"]): Reservation {
  return { ...base, id, status, type: "sale", start: at("2030-02-01T00:00:00Z") };
}

const now = at("2030-02-10T00:00:00Z");

describe("deriveAvailability", () => {
  it("is available with nothing in flight", () => {
    expect(deriveAvailability({ completedSale: null, active: [], now })).toBe("available");
  });

  it("is sold once a sale completed, whatever else exists", () => {
    const active = [rentalRow("r1", "confirmed", "2030-02-01T00:00:00Z", "2030-02-20T00:00:00Z")];
    expect(deriveAvailability({ completedSale: saleRow("s1", "completed"), active, now })).toBe("sold");
  });

  it("is reserved by a pending or confirmed sale", () => {
    expect(deriveAvailability({ completedSale: null, active: [saleRow("s1", "pending")], now })).toBe("reserved");
    expect(deriveAvailability({ completedSale: null, active: [saleRow("s1", "confirmed")], now })).toBe("reserved");
  });

  it("is reserved by a confirmed rental that has started, including at its first instant", () => {
    const started = rentalRow("r1", "confirmed", "2030-02-10T00:00:00Z", "2030-02-12T00:00:00Z");
    expect(deriveAvailability({ completedSale: null, active: [started], now })).toBe("reserved");
  });

  it("stays reserved for an overdue confirmed rental", () => {
    const overdue = rentalRow("r1", "confirmed", "2030-02-01T00:00:00Z", "2030-02-05T00:00:00Z");
    expect(deriveAvailability({ completedSale: null, active: [overdue], now })).toBe("reserved");
  });

  it("ignores pending rentals and future confirmed ones", () => {
    const active = [
      rentalRow("r1", "pending", "2030-02-01T00:00:00Z", "2030-02-20T00:00:00Z"),
      rentalRow("r2", "confirmed", "2030-03-01T00:00:00Z", "2030-03-05T00:00:00Z"),
    ];
    expect(deriveAvailability({ completedSale: null, active, now })).toBe("available");
  });

  it("skips rows that are no longer active", () => {
    const active = [saleRow("s1", "cancelled")];
    expect(deriveAvailability({ completedSale: null, active, now })).toBe("available");
  });
});
