import mongoose, { type FilterQuery } from "mongoose";

import { ReservationModel, type ReservationDoc } from "./model.js";
import { INITIAL_STATUS, sourcesOf } from "./stateMachine.js";
import {
  REVENUE_STATUSES,
  emptyStatusCounts,
  emptyTypeCounts,
  type MonthlyRevenue,
  type Reservation,
  type ReservationDraft,
  type ReservationFilter,
  type ReservationLedger,
  type ReservationPatch,
  type ReservationStats,
  type SetStatusOutcome,
  type StatusCounts,
} from "./types.js";
import { connectMongo } from "../../config/db.js";
import { ACTIVE_STATUSES, type ReservationStatus, type TransactionType } from "../../domain/enums.js";
import { isEntityId } from "../../utils/ids.js";
import { pageParams, type Page } from "../vehicles/types.js";

export function toReservation(doc: ReservationDoc): Reservation {
  const base = {
    id: String(doc._id),
    vehicleId: String(doc.vehicleId),
    userId: doc.userId,
    priceCents: doc.priceCents,
    notes: doc.notes ?? null,
    status: doc.status,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
  if (doc.type === "sale") return { ...base, type: "sale", start: doc.start };
  if (!doc.end) throw new Error(`Rental reservation ${base.id} has no end`);
  return { ...base, type: "rental", start: doc.start, end: doc.end };
}

export function buildReservationQuery(filter: ReservationFilter = {}): FilterQuery<ReservationDoc> {
  const q: FilterQuery<ReservationDoc> = {};
  if (filter.userId) q.userId = filter.userId;
  if (filter.vehicleId) q.vehicleId = new mongoose.Types.ObjectId(filter.vehicleId);
  if (filter.status) q.status = filter.status;
  if (filter.type) q.type = filter.type;
  if (filter.startFrom || filter.startTo) {
    q.start = {
      ...(filter.startFrom ? { $gte: filter.startFrom } : {}),
      ...(filter.startTo ? { $lte: filter.startTo } : {}),
    };
  }
  return q;
}

type StatsFacets = {
  byStatus: Array<{ _id: ReservationStatus; count: number }>;
  byType: Array<{ _id: TransactionType; count: number }>;
  monthly: Array<{ _id: string; revenueCents: number }>;
};

/** Mongoose-backed ledger. Status writes are conditional on the stored status. */
export class MongoReservationLedger implements ReservationLedger {
  async create(draft: ReservationDraft): Promise<Reservation> {
    await connectMongo();
    const doc = await ReservationModel.create({
      vehicleId: new mongoose.Types.ObjectId(draft.vehicleId),
      userId: draft.userId,
      type: draft.type,
      start: draft.start,
      end: draft.type === "rental" ? draft.end : null,
      priceCents: draft.priceCents,
      notes: draft.notes,
      status: INITIAL_STATUS,
    });
    return toReservation(doc);
  }

  async get(reservationId: string): Promise<Reservation | null> {
    if (!isEntityId(reservationId)) return null;
    await connectMongo();
    const doc = await ReservationModel.findById(reservationId).exec();
    return doc ? toReservation(doc) : null;
  }

  async findActiveByVehicle(vehicleId: string): Promise<Reservation[]> {
    if (!isEntityId(vehicleId)) return [];
    await connectMongo();
    const docs = await ReservationModel.find({
      vehicleId: new mongoose.Types.ObjectId(vehicleId),
      status: { $in: [...ACTIVE_STATUSES] },
    })
      .sort({ start: 1, createdAt: 1, _id: 1 })
      .exec();
    return docs.map(toReservation);
  }

  async findCompletedSale(vehicleId: string): Promise<Reservation | null> {
    if (!isEntityId(vehicleId)) return null;
    await connectMongo();
    const doc = await ReservationModel.findOne({
      vehicleId: new mongoose.Types.ObjectId(vehicleId),
      type: "sale",
      status: "completed",
    }).exec();
    return doc ? toReservation(doc) : null;
  }

  async setStatus(reservationId: string, next: ReservationStatus): Promise<SetStatusOutcome> {
    if (!isEntityId(reservationId)) return "not_found";
    await connectMongo();
    const updated = await ReservationModel.findOneAndUpdate(
      { _id: reservationId, status: { $in: sourcesOf(next) } },
      { $set: { status: next } },
      { new: true }
    ).exec();
    if (updated) return "ok";
    const exists = await ReservationModel.exists({ _id: reservationId });
    return exists ? "invalid_transition" : "not_found";
  }

  async update(reservationId: string, patch: ReservationPatch): Promise<Reservation | null> {
    if (!isEntityId(reservationId)) return null;
    await connectMongo();
    const set: Record<string, unknown> = {};
    if (patch.terms) {
      set.type = patch.terms.type;
      set.start = patch.terms.start;
      set.end = patch.terms.type === "rental" ? patch.terms.end : null;
    }
    if (patch.priceCents !== undefined) set.priceCents = patch.priceCents;
    if (patch.notes !== undefined) set.notes = patch.notes;

    const doc = await ReservationModel.findByIdAndUpdate(
      reservationId,
      { $set: set },
      { new: true, runValidators: true }
    ).exec();
    return doc ? toReservation(doc) : null;
  }

  async list(filter: ReservationFilter = {}): Promise<Page<Reservation>> {
    await connectMongo();
    const { page, limit, skip } = pageParams(filter);
    const q = buildReservationQuery(filter);
    const [docs, total] = await Promise.all([
      ReservationModel.find(q)
        .sort(filter.sort === "startAsc" ? { start: 1, createdAt: 1, _id: 1 } : { createdAt: -1, _id: -1 })
        .skip(skip)
        .limit(limit)
        .exec(),
      ReservationModel.countDocuments(q).exec(),
    ]);
    return { page, limit, total, items: docs.map(toReservation) };
  }

  async countByStatus(userId?: string): Promise<StatusCounts> {
    await connectMongo();
    const rows = await ReservationModel.aggregate<{ _id: ReservationStatus; count: number }>([
      { $match: userId ? { userId } : {} },
      { $group: { _id: "$status", count: { $sum: 1 } } },
    ]);
    const counts = emptyStatusCounts();
    for (const row of rows) counts[row._id] = row.count;
    return counts;
  }

  async statistics(since: Date): Promise<ReservationStats> {
    await connectMongo();
    const [facets] = await ReservationModel.aggregate<StatsFacets>([
      {
        $facet: {
          byStatus: [{ $group: { _id: "$status", count: { $sum: 1 } } }],
          byType: [{ $group: { _id: "$type", count: { $sum: 1 } } }],
          monthly: [
            { $match: { status: { $in: [...REVENUE_STATUSES] }, createdAt: { $gte: since } } },
            {
              $group: {
                _id: { $dateToString: { format: "%Y-%m", date: "$createdAt", timezone: "UTC" } },
                revenueCents: { $sum: "$priceCents" },
              },
            },
            { $sort: { _id: 1 } },
          ],
        },
      },
    ]);

    const byStatus = emptyStatusCounts();
    const byType = emptyTypeCounts();
    for (const row of facets?.byStatus ?? []) byStatus[row._id] = row.count;
    for (const row of facets?.byType ?? []) byType[row._id] = row.count;
    const monthlyRevenue: MonthlyRevenue[] = (facets?.monthly ?? []).map((m) => ({
      month: m._id,
      revenueCents: m.revenueCents,
    }));
    return {
      byStatus,
      byType,
      monthlyRevenue,
      totalRevenueCents: monthlyRevenue.reduce((sum, m) => sum + m.revenueCents, 0),
    };
  }

  async vehicleIdsWithActive(): Promise<string[]> {
    await connectMongo();
    const ids = await ReservationModel.distinct("vehicleId", {
      status: { $in: [...ACTIVE_STATUSES] },
    }).exec();
    return ids.map((id) => String(id));
  }
}
