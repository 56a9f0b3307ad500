import mongoose, { Schema, type Model } from "mongoose";

import { AVAILABILITY, type Availability } from "../../domain/enums.js";

export interface VehicleDoc extends Omit<mongoose.Document, "model"> {
  make: string;
  model: string;
  color: string;
  powertrain: string; // e.g. "2.0 TDI", "electric"
  priceCents: number; // list price; reservations carry their own final price
  mileage?: number | null;
  year?: number | null;
  description?: string | null;
  imageUrl?: string | null;
  active: boolean; // soft delete flag
  availability: Availability; // written only by the reservation coordinator
  createdAt: Date;
  updatedAt: Date;
}

const VehicleSchema = new Schema<VehicleDoc>(
  {
    make: { type: String, required: true, trim: true, maxlength: 100 },
    model: { type: String, required: true, trim: true, maxlength: 100 },
    color: { type: String, required: true, trim: true, maxlength: 50 },
    powertrain: { type: String, required: true, trim: true, maxlength: 100 },
    priceCents: { type: Number, required: true, min: 0 },
    mileage: { type: Number, min: 0, default: null },
    year: { type: Number, min: 1900, max: 2100, default: null },
    description: { type: String, trim: true, maxlength: 1000, default: null },
    imageUrl: { type: String, trim: true, maxlength: 500, default: null },
    active: { type: Boolean, default: true, index: true },
    availability: {
      type: String,
      enum: [...AVAILABILITY],
      default: "available",
      required: true,
    },
  },
  { timestamps: true }
);

/** Listing filters: active stock by availability, newest first */
VehicleSchema.index({ active: 1, availability: 1, createdAt: -1 });
/** Duplicate detection on create */
VehicleSchema.index({ make: 1, model: 1, color: 1, powertrain: 1, active: 1 });

export const VehicleModel: Model<VehicleDoc> =
  mongoose.models.Vehicle || mongoose.model<VehicleDoc>("Vehicle", VehicleSchema);
