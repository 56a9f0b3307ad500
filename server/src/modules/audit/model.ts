import mongoose, { Schema, type Model } from "mongoose";

type Target = { type: "vehicle"; id: mongoose.Types.ObjectId };

export interface AuditLogDoc extends mongoose.Document {
  actorId: string;
  action: string;
  target?: Target;
  diff?: Record<string, unknown>;
  at: Date;
}

const AuditLogSchema = new Schema<AuditLogDoc>(
  {
    actorId: { type: String, required: true, index: true },
    action: { type: String, required: true, index: true },
    target: { type: Schema.Types.Mixed },
    diff: { type: Schema.Types.Mixed },
    at: { type: Date, default: () => new Date(), index: true },
  },
  { versionKey: false }
);

export const AuditLog: Model<AuditLogDoc> =
  mongoose.models.AuditLog || mongoose.model<AuditLogDoc>("AuditLog", AuditLogSchema);
