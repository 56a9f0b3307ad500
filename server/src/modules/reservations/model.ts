import mongoose, { Schema, type Model } from "mongoose";

import {
  RESERVATION_STATUSES,
  TRANSACTION_TYPES,
  type ReservationStatus,
  type TransactionType,
} from "../../domain/enums.js";

export interface ReservationDoc extends mongoose.Document {
  vehicleId: mongoose.Types.ObjectId;
  userId: string; // opaque id from the identity service
  type: TransactionType;
  start: Date;
  end?: Date | null; // rentals only
  priceCents: number;
  notes?: string | null;
  status: ReservationStatus;
  createdAt: Date;
  updatedAt: Date;
}

const ReservationSchema = new Schema<ReservationDoc>(
  {
    vehicleId: { type: Schema.Types.ObjectId, ref: "Vehicle", required: true },
    userId: { type: String, required: true, index: true },
    type: { type: String, enum: [...TRANSACTION_TYPES], required: true },
    start: { type: Date, required: true },
    end: { type: Date, default: null }, // null for sales
    priceCents: { type: Number, required: true, min: 0 },
    notes: { type: String, trim: true, maxlength: 500, default: null },
    status: {
      type: String,
      enum: [...RESERVATION_STATUSES],
      default: "pending",
      required: true,
    },
  },
  { timestamps: true }
);

/** Active-by-vehicle scan in admissibility order */
ReservationSchema.index({ vehicleId: 1, status: 1, start: 1, createdAt: 1 });
/** Listings and dashboards */
ReservationSchema.index({ userId: 1, createdAt: -1 });
ReservationSchema.index({ status: 1, start: 1 });

export const ReservationModel: Model<ReservationDoc> =
  mongoose.models.Reservation ||
  mongoose.model<ReservationDoc>("Reservation", ReservationSchema);
