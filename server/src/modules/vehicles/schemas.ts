// server/src/modules/vehicles/schemas.ts
import { z } from "zod";

import type { Vehicle, VehicleFilter } from "./types.js";
import { AVAILABILITY } from "../../domain/enums.js";
import { fromCents, toCents } from "../../domain/money.js";

const text = (max: number) => z.string().trim().min(1).max(max);
const price = z.number().finite().positive().transform((n) => toCents(n));
const year = z.number().int().min(1900).max(2100);

/** Decimal prices in, integer cents out. */
export const CreateVehicleSchema = z
  .object({
    make: text(50),
    model: text(50),
    color: text(30),
    powertrain: text(30),
    price,
    mileage: z.number().int().min(0).nullable().default(null),
    year: year.nullable().default(null),
    description: z.string().max(2000).nullable().default(null),
    imageUrl: z.string().url().nullable().default(null),
  })
  .strict()
  .transform(({ price: priceCents, ...rest }) => ({ ...rest, priceCents }));

// availability is not editable here; .strict() turns an attempt into a 422
export const UpdateVehicleSchema = z
  .object({
    make: text(50).optional(),
    model: text(50).optional(),
    color: text(30).optional(),
    powertrain: text(30).optional(),
    price: price.optional(),
    mileage: z.number().int().min(0).nullable().optional(),
    year: year.nullable().optional(),
    description: z.string().max(2000).nullable().optional(),
    imageUrl: z.string().url().nullable().optional(),
  })
  .strict()
  .refine((o) => Object.keys(o).length > 0, { message: "Nothing to update" })
  .transform(({ price: priceCents, ...rest }) =>
    priceCents === undefined ? rest : { ...rest, priceCents }
  );

const queryNumber = z.coerce.number().finite();
const queryBool = z.enum(["true", "false"]).transform((v) => v === "true");

export const VehicleListQuery = z.object({
  make: z.string().optional(),
  model: z.string().optional(),
  color: z.string().optional(),
  powertrain: z.string().optional(),
  minPrice: queryNumber.min(0).optional(),
  maxPrice: queryNumber.min(0).optional(),
  minYear: queryNumber.int().optional(),
  maxYear: queryNumber.int().optional(),
  maxMileage: queryNumber.int().min(0).optional(),
  availability: z.enum(AVAILABILITY).optional(),
  search: z.string().max(100).optional(),
  includeInactive: queryBool.optional(),
  page: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type VehicleListQuery = z.infer<typeof VehicleListQuery>;

export function toVehicleFilter(q: VehicleListQuery): VehicleFilter {
  return {
    make: q.make,
    model: q.model,
    color: q.color,
    powertrain: q.powertrain,
    priceRange: {
      min: q.minPrice !== undefined ? toCents(q.minPrice) : undefined,
      max: q.maxPrice !== undefined ? toCents(q.maxPrice) : undefined,
    },
    yearRange: { min: q.minYear, max: q.maxYear },
    maxMileage: q.maxMileage,
    availability: q.availability,
    search: q.search,
    includeInactive: q.includeInactive,
    page: q.page,
    limit: q.limit,
  };
}

/** API shape: decimal price instead of cents. */
export function toPublicVehicle(v: Vehicle) {
  const { priceCents, ...rest } = v;
  return { ...rest, price: fromCents(priceCents) };
}
