import { z } from "zod";
import { AmountSchema, CurrencySchema } from "../domain/money.js";
import { IdempotencyKeySchema } from "../domain/reservation.js";
import { ResolvedPriceSchema } from "../domain/tariff.js";
import { SlotFieldsSchema, endsAfterStart, endsAfterStartIssue } from "./slot.js";

export const RescheduleReservationRequestSchema = SlotFieldsSchema.extend({
  reservation_id: z.string().min(1),
  // Defaults to the current court; must belong to the same venue.
  court_id: z.string().min(1).optional(),
  idempotency_key: IdempotencyKeySchema,
}).refine(endsAfterStart, endsAfterStartIssue);

export const PriceDifferenceSchema = z.object({
  type: z.enum(["additional_charge", "partial_refund", "no_change"]),
  amount: AmountSchema,
  currency: CurrencySchema,
});

export const RescheduleReservationResponseSchema = z.object({
  original_reservation_id: z.string(),
  reservation: z.object({
    reservation_id: z.string(),
    state: z.literal("confirmed"),
    court_id: z.string(),
    date: z.string(),
    start_time: z.string(),
    end_time: z.string(),
    price: ResolvedPriceSchema,
  }),
  price_difference: PriceDifferenceSchema,
});

export type RescheduleReservationRequest = z.infer<typeof RescheduleReservationRequestSchema>;
export type RescheduleReservationResponse = z.infer<typeof RescheduleReservationResponseSchema>;
export type PriceDifference = z.infer<typeof PriceDifferenceSchema>;
