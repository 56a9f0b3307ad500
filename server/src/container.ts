// server/src/container.ts
/** Wires stores, lock, audit sink and clock into the services the routes use. */
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { key, redisClient } from "./config/redis.js";
import { logAuditSink, mongoAuditSink, type AuditSink } from "./modules/audit/service.js";
import {
  LeaseVehicleLock,
  LocalVehicleLock,
  redisLeaseStore,
  type VehicleLock,
} from "./modules/locks/service.js";
import { ReservationCoordinator } from "./modules/reservations/coordinator.js";
import { MongoReservationLedger } from "./modules/reservations/ledger.js";
import { MemoryReservationLedger } from "./modules/reservations/memory.js";
import { ReservationQueries } from "./modules/reservations/queries.js";
import type { ReservationLedger } from "./modules/reservations/types.js";
import { MemoryVehicleRegistry } from "./modules/vehicles/memory.js";
import { MongoVehicleRegistry } from "./modules/vehicles/registry.js";
import { InventoryService } from "./modules/vehicles/service.js";
import type { VehicleInventory } from "./modules/vehicles/types.js";
import { systemClock, type Clock } from "./utils/dates.js";

export type Infrastructure = {
  inventory: VehicleInventory;
  ledger: ReservationLedger;
  lock: VehicleLock;
  audit: AuditSink;
  clock: Clock;
  allowMidTermCancel?: boolean;
};

export type Services = {
  coordinator: ReservationCoordinator;
  inventory: InventoryService;
  queries: ReservationQueries;
};

export function wireServices(infra: Infrastructure): Services {
  return {
    coordinator: new ReservationCoordinator({
      registry: infra.inventory,
      ledger: infra.ledger,
      lock: infra.lock,
      audit: infra.audit,
      clock: infra.clock,
      allowMidTermCancel: infra.allowMidTermCancel,
    }),
    inventory: new InventoryService(infra.inventory, infra.ledger, infra.lock),
    queries: new ReservationQueries(infra.ledger, infra.inventory, infra.clock),
  };
}

/** Picks drivers from STORE_DRIVER / LOCK_DRIVER. */
export async function buildInfrastructure(clock: Clock = systemClock): Promise<Infrastructure> {
  const now = () => clock.now();
  const mongo = env.STORE_DRIVER === "mongo";

  let lock: VehicleLock;
  if (env.LOCK_DRIVER === "redis") {
    const client = await redisClient();
    lock = new LeaseVehicleLock(redisLeaseStore(client), {
      keyFor: (vehicleId) => key("lock", "vehicle", vehicleId),
      ttlMs: env.LOCK_TTL_MS,
      waitMs: env.LOCK_WAIT_MS,
      retryMs: env.LOCK_RETRY_MS,
    });
  } else {
    lock = new LocalVehicleLock(env.LOCK_WAIT_MS);
  }

  logger.info("Drivers selected", { store: env.STORE_DRIVER, lock: env.LOCK_DRIVER });

  return {
    inventory: mongo ? new MongoVehicleRegistry() : new MemoryVehicleRegistry(now),
    ledger: mongo ? new MongoReservationLedger() : new MemoryReservationLedger(now),
    lock,
    audit: mongo ? mongoAuditSink : logAuditSink,
    clock,
    allowMidTermCancel: env.ALLOW_MIDTERM_CANCEL,
  };
}
