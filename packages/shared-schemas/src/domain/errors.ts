import { z } from "zod";

export const BookingErrorKindSchema = z.enum([
  "NoApplicableTariff",
  "InvalidTimeZone",
  "OutsideOpeningHours",
  "CourtNotReservable",
  "OverlappingReservation",
  "InvalidState",
  "NotFound",
  "Forbidden",
  "ValidationFailed",
]);

export const ErrorResponseSchema = z.object({
  error: z.object({
    kind: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});

export type BookingErrorKind = z.infer<typeof BookingErrorKindSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
