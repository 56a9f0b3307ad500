import "dotenv/config";
import mongoose from "mongoose";

import { connectMongo } from "../src/config/db.js";
import { AuditLog } from "../src/modules/audit/model.js";
import { ReservationModel } from "../src/modules/reservations/model.js";
import { VehicleModel } from "../src/modules/vehicles/model.js";
import { errorMessage } from "../src/utils/http.js";

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  const models = [VehicleModel, ReservationModel, AuditLog];
  for (const m of models) {
    console.log(`→ syncing indexes for ${m.modelName}...`);
    await m.syncIndexes();
  }

  // 2) Print what ended up on each collection
  const db = mongoose.connection.db;
  if (!db) throw new Error("Mongo connection not ready");
  for (const m of models) {
    const colName = m.collection.collectionName;
    try {
      const idx = await db.collection(colName).indexes();
      console.log(
        `${colName} indexes:`,
        idx.map((i) => i.name)
      );
    } catch (e) {
      console.log(`${colName}: could not list indexes ->`, errorMessage(e));
    }
  }

  await mongoose.disconnect();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
