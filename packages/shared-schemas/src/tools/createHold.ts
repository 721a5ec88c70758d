import { z } from "zod";
import { IdempotencyKeySchema } from "../domain/reservation.js";
import { ResolvedPriceSchema } from "../domain/tariff.js";
import { SlotFieldsSchema, endsAfterStart, endsAfterStartIssue } from "./slot.js";

export const CreateHoldRequestSchema = SlotFieldsSchema.extend({
  venue_id: z.string().min(1),
  court_id: z.string().min(1),
  idempotency_key: IdempotencyKeySchema,
}).refine(endsAfterStart, endsAfterStartIssue);

export const CreateHoldResponseSchema = z.object({
  reservation_id: z.string(),
  state: z.literal("hold"),
  hold_expires_at: z.string(),
  price: ResolvedPriceSchema,
});

export type CreateHoldRequest = z.infer<typeof CreateHoldRequestSchema>;
export type CreateHoldResponse = z.infer<typeof CreateHoldResponseSchema>;
