import type { AvailabilityService } from "../../../services/availability/availabilityService.js";
import type { PriceQuoteService } from "../../../services/pricing/priceQuoteService.js";
import type { HoldSweeper } from "../../../services/reservations/holdSweeper.js";
import type { ReservationService } from "../../../services/reservations/reservationService.js";

export type ToolDeps = {
  quotes: PriceQuoteService;
  reservations: ReservationService;
  availability: AvailabilityService;
  sweeper: HoldSweeper;
  apiKey: string;
  readOnly: boolean;
};
