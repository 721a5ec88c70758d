import { z } from "zod";
import { IdempotencyKeySchema } from "../domain/reservation.js";
import { ResolvedPriceSchema } from "../domain/tariff.js";

export const ConfirmReservationRequestSchema = z.object({
  reservation_id: z.string().min(1),
  idempotency_key: IdempotencyKeySchema.optional(),
});

export const ConfirmReservationResponseSchema = z.object({
  reservation_id: z.string(),
  state: z.literal("confirmed"),
  confirmed_at: z.string(),
  price: ResolvedPriceSchema,
});

export type ConfirmReservationRequest = z.infer<typeof ConfirmReservationRequestSchema>;
export type ConfirmReservationResponse = z.infer<typeof ConfirmReservationResponseSchema>;
