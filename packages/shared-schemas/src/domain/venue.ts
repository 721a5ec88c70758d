import { z } from "zod";

export const TimeRangeSchema = z
  .string()
  .regex(
    /^([01]\d|2[0-3]):[0-5]\d-([01]\d|2[0-3]):[0-5]\d$/,
    "Expected opening range like 08:00-22:00"
  );

const DayRangesSchema = z.array(TimeRangeSchema).optional();

/** Opening ranges per weekday. A missing or empty day means closed. */
export const OpeningHoursSchema = z.object({
  monday: DayRangesSchema,
  tuesday: DayRangesSchema,
  wednesday: DayRangesSchema,
  thursday: DayRangesSchema,
  friday: DayRangesSchema,
  saturday: DayRangesSchema,
  sunday: DayRangesSchema,
});

export const VenueSchema = z.object({
  venue_id: z.string().min(1),
  name: z.string().min(1),
  timezone: z.string().min(1),
  opening_hours: OpeningHoursSchema,
  buffer_minutes: z.number().int().nonnegative(),
});

export const CourtSchema = z.object({
  court_id: z.string().min(1),
  venue_id: z.string().min(1),
  name: z.string().min(1),
  reservable: z.boolean(),
  // Replaces the venue schedule entirely when set.
  opening_hours: OpeningHoursSchema.nullable().default(null),
});

export type OpeningHours = z.infer<typeof OpeningHoursSchema>;
export type Venue = z.infer<typeof VenueSchema>;
export type Court = z.infer<typeof CourtSchema>;
