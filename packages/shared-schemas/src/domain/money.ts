import { z } from "zod";

export const CurrencySchema = z.string().regex(/^[A-Z]{3}$/, "Expected ISO 4217 code like COP");

// Whole amounts in the tariff's currency; no conversion happens anywhere.
export const AmountSchema = z.number().int().nonnegative();

export const RefundTypeSchema = z.enum(["full", "partial", "none"]);

export const RefundSchema = z.object({
  type: RefundTypeSchema,
  amount: AmountSchema,
  currency: CurrencySchema,
});

export type Currency = z.infer<typeof CurrencySchema>;
export type Refund = z.infer<typeof RefundSchema>;
export type RefundType = z.infer<typeof RefundTypeSchema>;
