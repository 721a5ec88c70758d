import { z } from "zod";
import { ReservationHistoryEntrySchema } from "../domain/history.js";
import { ReservationSchema } from "../domain/reservation.js";

export const GetReservationDetailsRequestSchema = z.object({
  reservation_id: z.string().min(1),
});

export const GetReservationDetailsResponseSchema = z.object({
  reservation: ReservationSchema,
  /** Newest first. */
  history: z.array(ReservationHistoryEntrySchema),
});

export type GetReservationDetailsRequest = z.infer<typeof GetReservationDetailsRequestSchema>;
export type GetReservationDetailsResponse = z.infer<typeof GetReservationDetailsResponseSchema>;
