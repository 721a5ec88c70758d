import type { FastifyInstance } from "fastify";
import type { ToolDeps } from "./deps.js";
import { registerResolvePrice } from "./resolvePrice.js";
import { registerCreateHold } from "./createHold.js";
import { registerConfirmReservation } from "./confirmReservation.js";
import { registerCancelReservation } from "./cancelReservation.js";
import { registerRescheduleReservation } from "./rescheduleReservation.js";
import { registerGetReservationDetails } from "./getReservationDetails.js";
import { registerCheckAvailability } from "./checkAvailability.js";
import { registerSweepExpiredHolds } from "./sweepExpiredHolds.js";

export type { ToolDeps } from "./deps.js";

export function registerToolRoutes(app: FastifyInstance, deps: ToolDeps) {
  registerResolvePrice(app, deps);
  registerCreateHold(app, deps);
  registerConfirmReservation(app, deps);
  registerCancelReservation(app, deps);
  registerRescheduleReservation(app, deps);
  registerGetReservationDetails(app, deps);
  registerCheckAvailability(app, deps);
  registerSweepExpiredHolds(app, deps);
}
