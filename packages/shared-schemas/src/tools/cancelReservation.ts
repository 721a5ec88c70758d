import { z } from "zod";
import { RefundSchema } from "../domain/money.js";
import { IdempotencyKeySchema } from "../domain/reservation.js";

export const CancelReservationRequestSchema = z.object({
  reservation_id: z.string().min(1),
  reason: z.string().trim().min(1).max(500),
  idempotency_key: IdempotencyKeySchema,
});

export const CancelReservationResponseSchema = z.object({
  reservation_id: z.string(),
  state: z.literal("cancelled"),
  cancelled_at: z.string(),
  cancellation_reason: z.string(),
  refund: RefundSchema,
});

export type CancelReservationRequest = z.infer<typeof CancelReservationRequestSchema>;
export type CancelReservationResponse = z.infer<typeof CancelReservationResponseSchema>;
