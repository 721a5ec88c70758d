import { z } from "zod";
import { ReservationStateSchema } from "./reservation.js";

export const ReservationHistoryEntrySchema = z.object({
  reservation_id: z.string(),
  /** Null for the entry that created the reservation. */
  from_state: ReservationStateSchema.nullable(),
  to_state: ReservationStateSchema,
  actor_id: z.string(),
  at: z.string(),
  note: z.string().nullable(),
});

export type ReservationHistoryEntry = z.infer<typeof ReservationHistoryEntrySchema>;
