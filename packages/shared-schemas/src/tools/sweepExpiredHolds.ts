import { z } from "zod";

export const SweepExpiredHoldsResponseSchema = z.object({
  expired: z.number().int().nonnegative(),
  reservation_ids: z.array(z.string()),
  ran_at: z.string(),
});

export type SweepExpiredHoldsResponse = z.infer<typeof SweepExpiredHoldsResponseSchema>;
