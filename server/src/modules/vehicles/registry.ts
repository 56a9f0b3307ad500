import type { FilterQuery } from "mongoose";

import { VehicleModel, type VehicleDoc } from "./model.js";
import {
  emptyAvailabilityCounts,
  escapeRegExp,
  pageParams,
  type InventoryStats,
  type NewVehicle,
  type Page,
  type Vehicle,
  type VehicleFilter,
  type VehicleInventory,
  type VehiclePatch,
} from "./types.js";
import { connectMongo } from "../../config/db.js";
import type { Availability } from "../../domain/enums.js";
import { isEntityId } from "../../utils/ids.js";

export function toVehicle(doc: VehicleDoc): Vehicle {
  return {
    id: String(doc._id),
    make: doc.make,
    model: doc.model,
    color: doc.color,
    powertrain: doc.powertrain,
    priceCents: doc.priceCents,
    mileage: doc.mileage ?? null,
    year: doc.year ?? null,
    description: doc.description ?? null,
    imageUrl: doc.imageUrl ?? null,
    active: doc.active,
    availability: doc.availability,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

const contains = (s: string) => new RegExp(escapeRegExp(s.trim()), "i");

/** Translate a vehicle filter into a Mongo query (all clauses ANDed). */
export function buildVehicleQuery(filter: VehicleFilter = {}): FilterQuery<VehicleDoc> {
  const q: FilterQuery<VehicleDoc> = {};
  if (!filter.includeInactive) q.active = true;
  if (filter.make) q.make = contains(filter.make);
  if (filter.model) q.model = contains(filter.model);
  if (filter.color) q.color = contains(filter.color);
  if (filter.powertrain) q.powertrain = contains(filter.powertrain);
  if (filter.availability) q.availability = filter.availability;

  const price = filter.priceRange;
  if (price && (price.min !== undefined || price.max !== undefined)) {
    q.priceCents = {
      ...(price.min !== undefined ? { $gte: price.min } : {}),
      ...(price.max !== undefined ? { $lte: price.max } : {}),
    };
  }
  const year = filter.yearRange;
  if (year && (year.min !== undefined || year.max !== undefined)) {
    q.year = {
      ...(year.min !== undefined ? { $gte: year.min } : {}),
      ...(year.max !== undefined ? { $lte: year.max } : {}),
    };
  }
  if (filter.maxMileage !== undefined) q.mileage = { $lte: filter.maxMileage };

  if (filter.search?.trim()) {
    const rx = contains(filter.search);
    q.$or = [
      { make: rx },
      { model: rx },
      { color: rx },
      { powertrain: rx },
      { description: rx },
    ];
  }
  return q;
}

/** Mongoose-backed vehicle store. */
export class MongoVehicleRegistry implements VehicleInventory {
  async get(vehicleId: string): Promise<Vehicle | null> {
    if (!isEntityId(vehicleId)) return null;
    await connectMongo();
    const doc = await VehicleModel.findById(vehicleId).exec();
    return doc ? toVehicle(doc) : null;
  }

  async setAvailability(vehicleId: string, state: Availability): Promise<boolean> {
    if (!isEntityId(vehicleId)) return false;
    await connectMongo();
    const res = await VehicleModel.updateOne({ _id: vehicleId }, { $set: { availability: state } });
    return res.matchedCount > 0;
  }

  async list(filter: VehicleFilter = {}): Promise<Page<Vehicle>> {
    await connectMongo();
    const { page, limit, skip } = pageParams(filter);
    const q = buildVehicleQuery(filter);
    const [docs, total] = await Promise.all([
      VehicleModel.find(q).sort({ createdAt: -1, _id: -1 }).skip(skip).limit(limit).exec(),
      VehicleModel.countDocuments(q).exec(),
    ]);
    return { page, limit, total, items: docs.map(toVehicle) };
  }

  async create(input: NewVehicle): Promise<Vehicle> {
    await connectMongo();
    const doc = await VehicleModel.create({ ...input, active: true, availability: "available" });
    return toVehicle(doc);
  }

  async update(vehicleId: string, patch: VehiclePatch): Promise<Vehicle | null> {
    if (!isEntityId(vehicleId)) return null;
    await connectMongo();
    const doc = await VehicleModel.findByIdAndUpdate(
      vehicleId,
      { $set: patch },
      { new: true, runValidators: true }
    ).exec();
    return doc ? toVehicle(doc) : null;
  }

  async setActive(vehicleId: string, active: boolean): Promise<Vehicle | null> {
    if (!isEntityId(vehicleId)) return null;
    await connectMongo();
    const doc = await VehicleModel.findByIdAndUpdate(
      vehicleId,
      { $set: { active } },
      { new: true }
    ).exec();
    return doc ? toVehicle(doc) : null;
  }

  async findDuplicate(
    identity: Pick<Vehicle, "make" | "model" | "color" | "powertrain">
  ): Promise<Vehicle | null> {
    await connectMongo();
    const doc = await VehicleModel.findOne({ ...identity, active: true }).exec();
    return doc ? toVehicle(doc) : null;
  }

  async stats(): Promise<InventoryStats> {
    await connectMongo();
    const [byAvailability, byMake, prices] = await Promise.all([
      VehicleModel.aggregate<{ _id: Availability; count: number }>([
        { $match: { active: true } },
        { $group: { _id: "$availability", count: { $sum: 1 } } },
      ]),
      VehicleModel.aggregate<{ _id: string; count: number }>([
        { $match: { active: true } },
        { $group: { _id: "$make", count: { $sum: 1 } } },
        { $sort: { count: -1, _id: 1 } },
        { $limit: 10 },
      ]),
      VehicleModel.aggregate<{ total: number; avg: number; min: number; max: number }>([
        { $match: { active: true } },
        {
          $group: {
            _id: null,
            total: { $sum: 1 },
            avg: { $avg: "$priceCents" },
            min: { $min: "$priceCents" },
            max: { $max: "$priceCents" },
          },
        },
      ]),
    ]);

    const counts = emptyAvailabilityCounts();
    for (const row of byAvailability) counts[row._id] = row.count;
    const p = prices[0];

    return {
      total: p?.total ?? 0,
      byAvailability: counts,
      byMake: byMake.map((r) => ({ make: r._id, count: r.count })),
      averagePriceCents: p ? Math.round(p.avg) : 0,
      priceRangeCents: { min: p?.min ?? 0, max: p?.max ?? 0 },
    };
  }
}
