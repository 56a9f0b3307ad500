import { Router } from "express";

import {
  CreateVehicleSchema,
  UpdateVehicleSchema,
  VehicleListQuery,
  toPublicVehicle,
  toVehicleFilter,
} from "./schemas.js";
import type { InventoryService } from "./service.js";
import { notFound } from "../../domain/result.js";
import { getAuth, requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk, toAppError, unwrap } from "../../utils/http.js";
import type { ReservationCoordinator } from "../reservations/coordinator.js";
import { toPublicReservation } from "../reservations/schemas.js";

export type VehicleRouteDeps = {
  coordinator: ReservationCoordinator;
  inventory: InventoryService;
};

export function vehiclesRouter({ coordinator, inventory }: VehicleRouteDeps): Router {
  const router = Router();
  router.use(requireAuth);

  /** GET /vehicles: filtered, paginated inventory (inactive ones for sellers on request) */
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const q = VehicleListQuery.parse(req.query);
      const { role } = getAuth(res);
      const filter = toVehicleFilter({ ...q, includeInactive: role === "seller" && q.includeInactive });
      const page = await coordinator.listVehicles(filter);
      jsonOk(res, { ...page, items: page.items.map(toPublicVehicle) });
    })
  );

  router.get(
    "/stats",
    requireRole("seller"),
    asyncHandler(async (_req, res) => {
      jsonOk(res, await inventory.stats());
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const vehicle = unwrap(await coordinator.getVehicle(req.params.id));
      if (!vehicle.active && getAuth(res).role !== "seller") {
        throw toAppError(notFound("vehicle", vehicle.id));
      }
      jsonOk(res, toPublicVehicle(vehicle));
    })
  );

  /** Pending and confirmed reservations on one vehicle, by start */
  router.get(
    "/:id/reservations",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const active = unwrap(await coordinator.findActiveByVehicle(req.params.id));
      jsonOk(res, { items: active.map(toPublicReservation) });
    })
  );

  router.post(
    "/",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const input = CreateVehicleSchema.parse(req.body);
      const vehicle = unwrap(await inventory.createVehicle(input));
      jsonOk(res, toPublicVehicle(vehicle), 201);
    })
  );

  router.patch(
    "/:id",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const patch = UpdateVehicleSchema.parse(req.body);
      const vehicle = unwrap(await inventory.updateVehicle(req.params.id, patch));
      jsonOk(res, toPublicVehicle(vehicle));
    })
  );

  /** Soft delete */
  router.delete(
    "/:id",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const vehicle = unwrap(await inventory.deactivateVehicle(req.params.id));
      jsonOk(res, toPublicVehicle(vehicle));
    })
  );

  return router;
}
