import { Router, type Response } from "express";

import type { ReservationCoordinator } from "./coordinator.js";
import type { ReservationQueries } from "./queries.js";
import {
  AmendReservationSchema,
  CancelReservationSchema,
  CreateReservationSchema,
  PageQuery,
  ReservationListQuery,
  UpcomingQuery,
  VehicleIdParam,
  toPublicReservation,
  toPublicStats,
} from "./schemas.js";
import type { Reservation } from "./types.js";
import { getAuth, requireAuth, requireRole } from "../../middlewares/auth.js";
import { AppError, asyncHandler, jsonOk, unwrap } from "../../utils/http.js";

export type ReservationRouteDeps = {
  coordinator: ReservationCoordinator;
  queries: ReservationQueries;
};

export function reservationsRouter({ coordinator, queries }: ReservationRouteDeps): Router {
  const router = Router();
  router.use(requireAuth);

  // owner or seller
  async function loadVisible(res: Response, id: string): Promise<Reservation> {
    const r = unwrap(await coordinator.getReservation(id));
    if (!queries.canView(getAuth(res), r)) {
      throw new AppError("Not your reservation", { status: 403, code: "FORBIDDEN" });
    }
    return r;
  }

  /** POST /reservations: request a sale or rental as the calling user */
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const body = CreateReservationSchema.parse(req.body);
      const { userId } = getAuth(res);
      const created = unwrap(
        await coordinator.requestReservation({
          vehicleId: body.vehicleId,
          userId,
          terms: { type: body.type, start: body.start, end: body.end },
          priceCents: body.finalPrice,
          notes: body.notes ?? null,
        })
      );
      jsonOk(res, toPublicReservation(created), 201);
    })
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const filter = ReservationListQuery.parse(req.query);
      const page = await queries.list(getAuth(res), filter);
      jsonOk(res, { ...page, items: page.items.map(toPublicReservation) });
    })
  );

  router.get(
    "/upcoming",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const { days } = UpcomingQuery.parse(req.query);
      const items = await queries.upcoming(days);
      jsonOk(res, { days, items: items.map(toPublicReservation) });
    })
  );

  router.get(
    "/dashboard",
    asyncHandler(async (_req, res) => {
      jsonOk(res, await queries.dashboard(getAuth(res)));
    })
  );

  router.get(
    "/statistics",
    requireRole("seller"),
    asyncHandler(async (_req, res) => {
      jsonOk(res, toPublicStats(await queries.statistics()));
    })
  );

  /** Full history of one vehicle, cancelled and completed included */
  router.get(
    "/vehicle/:vehicleId",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const vehicleId = VehicleIdParam.parse(req.params.vehicleId);
      const page = unwrap(await queries.forVehicle(vehicleId, PageQuery.parse(req.query)));
      jsonOk(res, { ...page, items: page.items.map(toPublicReservation) });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      jsonOk(res, toPublicReservation(await loadVisible(res, req.params.id)));
    })
  );

  /** Amend a pending reservation (window, price, notes) */
  router.patch(
    "/:id",
    asyncHandler(async (req, res) => {
      const body = AmendReservationSchema.parse(req.body);
      await loadVisible(res, req.params.id);
      const updated = unwrap(
        await coordinator.amend(req.params.id, getAuth(res).userId, {
          start: body.start,
          end: body.end,
          priceCents: body.finalPrice,
          notes: body.notes,
        })
      );
      jsonOk(res, toPublicReservation(updated));
    })
  );

  router.post(
    "/:id/confirm",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const r = unwrap(await coordinator.confirm(req.params.id, getAuth(res).userId));
      jsonOk(res, toPublicReservation(r));
    })
  );

  /** allowMidTerm is a seller override; clients always get the configured policy */
  router.post(
    "/:id/cancel",
    asyncHandler(async (req, res) => {
      const body = CancelReservationSchema.parse(req.body ?? {});
      await loadVisible(res, req.params.id);
      const auth = getAuth(res);
      const r = unwrap(
        await coordinator.cancel(req.params.id, auth.userId, {
          allowMidTerm: auth.role === "seller" ? body.allowMidTerm : undefined,
        })
      );
      jsonOk(res, toPublicReservation(r));
    })
  );

  router.post(
    "/:id/complete",
    requireRole("seller"),
    asyncHandler(async (req, res) => {
      const r = unwrap(await coordinator.complete(req.params.id, getAuth(res).userId));
      jsonOk(res, toPublicReservation(r));
    })
  );

  return router;
}
