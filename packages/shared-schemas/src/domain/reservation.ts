import { z } from "zod";
import { DateSchema, LocalTimeSchema } from "./date.js";
import { RefundSchema } from "./money.js";
import { ResolvedPriceSchema } from "./tariff.js";

export const ReservationStateSchema = z.enum([
  "hold",
  "pending",
  "confirmed",
  "cancelled",
  "expired",
  "rescheduled",
]);

export const ACTIVE_RESERVATION_STATES = ["hold", "pending", "confirmed"] as const;

export const IdempotencyKeySchema = z.string().min(6).max(120);

export const ReservationBaseSchema = z.object({
  reservation_id: z.string(),
  venue_id: z.string(),
  court_id: z.string(),
  requested_by: z.string().min(1),
  date: DateSchema,
  start_time: LocalTimeSchema,
  end_time: LocalTimeSchema,
  price: ResolvedPriceSchema,
  idempotency_keys: z.object({
    hold: z.string(),
    confirm: z.string().nullable(),
    cancel: z.string().nullable(),
  }),
  /** Set on the confirmed reservation a reschedule created. */
  rescheduled_from: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const HoldReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("hold"),
  hold_expires_at: z.string(),
});

export const PendingReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("pending"),
});

export const ConfirmedReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("confirmed"),
  confirmed_at: z.string(),
});

export const CancelledReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("cancelled"),
  cancelled_at: z.string(),
  cancellation_reason: z.string(),
  refund: RefundSchema,
});

export const ExpiredReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("expired"),
  expired_at: z.string(),
});

export const RescheduledReservationSchema = ReservationBaseSchema.extend({
  state: z.literal("rescheduled"),
  rescheduled_at: z.string(),
  rescheduled_to: z.string(),
});

export const ReservationSchema = z.discriminatedUnion("state", [
  HoldReservationSchema,
  PendingReservationSchema,
  ConfirmedReservationSchema,
  CancelledReservationSchema,
  ExpiredReservationSchema,
  RescheduledReservationSchema,
]);

export type ReservationState = z.infer<typeof ReservationStateSchema>;
export type ReservationBase = z.infer<typeof ReservationBaseSchema>;
export type HoldReservation = z.infer<typeof HoldReservationSchema>;
export type PendingReservation = z.infer<typeof PendingReservationSchema>;
export type ConfirmedReservation = z.infer<typeof ConfirmedReservationSchema>;
export type CancelledReservation = z.infer<typeof CancelledReservationSchema>;
export type ExpiredReservation = z.infer<typeof ExpiredReservationSchema>;
export type RescheduledReservation = z.infer<typeof RescheduledReservationSchema>;
export type Reservation = z.infer<typeof ReservationSchema>;
