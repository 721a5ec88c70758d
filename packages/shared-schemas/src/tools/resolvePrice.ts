import { z } from "zod";
import { ResolvedPriceSchema } from "../domain/tariff.js";
import { SlotFieldsSchema, endsAfterStart, endsAfterStartIssue } from "./slot.js";

export const ResolvePriceRequestSchema = SlotFieldsSchema.extend({
  venue_id: z.string().min(1),
  court_id: z.string().min(1).optional(),
}).refine(endsAfterStart, endsAfterStartIssue);

export const ResolvePriceResponseSchema = ResolvedPriceSchema;

export type ResolvePriceRequest = z.infer<typeof ResolvePriceRequestSchema>;
export type ResolvePriceResponse = z.infer<typeof ResolvePriceResponseSchema>;
