import { z } from "zod";
import { LocalTimeSchema, WeekdaySchema } from "./date.js";
import { AmountSchema, CurrencySchema } from "./money.js";

export const TariffScopeSchema = z.enum(["court", "venue"]);

export const TariffSchema = z
  .object({
    tariff_id: z.string().min(1),
    scope: TariffScopeSchema,
    venue_id: z.string().min(1),
    court_id: z.string().min(1).nullable(),
    weekday: WeekdaySchema,
    start_time: LocalTimeSchema,
    end_time: LocalTimeSchema,
    currency: CurrencySchema,
    price_per_block: AmountSchema,
    created_at: z.string(),
  })
  .refine((t) => (t.scope === "court") === (t.court_id !== null), {
    message: "court_id is required for court tariffs and forbidden for venue tariffs",
    path: ["court_id"],
  });

// Wire values of the price origin.
export const TariffOriginSchema = z.enum(["cancha", "sede"]);

export const ResolvedPriceSchema = z.object({
  origin: TariffOriginSchema,
  tariff_id: z.string(),
  currency: CurrencySchema,
  price_per_block: AmountSchema,
});

export type TariffScope = z.infer<typeof TariffScopeSchema>;
export type Tariff = z.infer<typeof TariffSchema>;
export type TariffOrigin = z.infer<typeof TariffOriginSchema>;
export type ResolvedPrice = z.infer<typeof ResolvedPriceSchema>;
