import type {
  PriceDifference,
  Refund,
  Reservation,
  ResolvedPrice,
} from "@courtbook/shared-schemas";

export type RefundPolicy = {
  fullRefundHours: number;
  partialRefundPercent: number;
};

export const DEFAULT_REFUND_POLICY: RefundPolicy = {
  fullRefundHours: 24,
  partialRefundPercent: 50,
};

const HOUR_MS = 60 * 60 * 1000;

export function computeRefund(
  reservation: Reservation,
  startsAt: Date,
  now: Date,
  policy: RefundPolicy
): Refund {
  const { currency, price_per_block } = reservation.price;
  // Holds were never paid for.
  if (reservation.state !== "confirmed") return { type: "none", amount: 0, currency };

  const lead = startsAt.getTime() - now.getTime();
  if (lead <= 0) return { type: "none", amount: 0, currency };
  if (lead >= policy.fullRefundHours * HOUR_MS) {
    return { type: "full", amount: price_per_block, currency };
  }
  const amount = Math.floor((price_per_block * policy.partialRefundPercent) / 100);
  if (amount === 0) return { type: "none", amount: 0, currency };
  return { type: "partial", amount, currency };
}

/** What moving a reservation to a differently priced slot owes either side. */
export function priceDifference(before: ResolvedPrice, after: ResolvedPrice): PriceDifference {
  const delta = after.price_per_block - before.price_per_block;
  const type = delta > 0 ? "additional_charge" : delta < 0 ? "partial_refund" : "no_change";
  return { type, amount: Math.abs(delta), currency: after.currency };
}
