import { z } from "zod";
import { DateSchema, LocalTimeSchema } from "../domain/date.js";

export const CheckAvailabilityRequestSchema = z.object({
  venue_id: z.string().min(1),
  court_id: z.string().min(1),
  date: DateSchema,
  slot_minutes: z.number().int().min(15).max(240).default(60),
});

export const AvailabilitySlotSchema = z.object({
  start_time: LocalTimeSchema,
  end_time: LocalTimeSchema,
  available: z.boolean(),
});

export const CheckAvailabilityResponseSchema = z.object({
  venue_id: z.string(),
  court_id: z.string(),
  date: DateSchema,
  timezone: z.string(),
  closed: z.boolean(),
  buffer_minutes: z.number().int().nonnegative(),
  slots: z.array(AvailabilitySlotSchema),
  total_slots: z.number().int().nonnegative(),
  available_slots: z.number().int().nonnegative(),
});

export type CheckAvailabilityRequest = z.infer<typeof CheckAvailabilityRequestSchema>;
export type CheckAvailabilityResponse = z.infer<typeof CheckAvailabilityResponseSchema>;
export type AvailabilitySlot = z.infer<typeof AvailabilitySlotSchema>;
