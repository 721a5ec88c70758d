import type {
  CancelledReservation,
  ConfirmedReservation,
  ExpiredReservation,
  Refund,
  RescheduledReservation,
  Reservation,
  ReservationBase,
  ReservationState,
} from "@courtbook/shared-schemas";

const TRANSITIONS: Record<ReservationState, readonly ReservationState[]> = {
  hold: ["confirmed", "cancelled", "expired"],
  pending: [],
  confirmed: ["cancelled", "rescheduled"],
  cancelled: [],
  expired: [],
  rescheduled: [],
};

export function canTransition(from: ReservationState, to: ReservationState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isHoldExpired(reservation: Reservation, now: Date): boolean {
  return reservation.state === "hold" && Date.parse(reservation.hold_expires_at) <= now.getTime();
}

/** Whether the reservation still occupies its slot at `now`. */
export function blocksSlot(reservation: Reservation, now: Date): boolean {
  switch (reservation.state) {
    case "hold":
      return !isHoldExpired(reservation, now);
    case "pending":
    case "confirmed":
      return true;
    case "cancelled":
    case "expired":
    case "rescheduled":
      return false;
  }
}

function baseOf(r: Reservation): ReservationBase {
  return {
    reservation_id: r.reservation_id,
    venue_id: r.venue_id,
    court_id: r.court_id,
    requested_by: r.requested_by,
    date: r.date,
    start_time: r.start_time,
    end_time: r.end_time,
    price: r.price,
    idempotency_keys: r.idempotency_keys,
    rescheduled_from: r.rescheduled_from,
    created_at: r.created_at,
    updated_at: r.updated_at,
  };
}

export function toConfirmed(r: Reservation, at: Date, confirmKey: string | null): ConfirmedReservation {
  const iso = at.toISOString();
  return {
    ...baseOf(r),
    state: "confirmed",
    confirmed_at: iso,
    updated_at: iso,
    idempotency_keys: { ...r.idempotency_keys, confirm: confirmKey },
  };
}

export function toCancelled(
  r: Reservation,
  at: Date,
  reason: string,
  refund: Refund,
  cancelKey: string
): CancelledReservation {
  const iso = at.toISOString();
  return {
    ...baseOf(r),
    state: "cancelled",
    cancelled_at: iso,
    cancellation_reason: reason,
    refund,
    updated_at: iso,
    idempotency_keys: { ...r.idempotency_keys, cancel: cancelKey },
  };
}

export function toExpired(r: Reservation, at: Date): ExpiredReservation {
  const iso = at.toISOString();
  return { ...baseOf(r), state: "expired", expired_at: iso, updated_at: iso };
}

/** The original side of a reschedule; the new slot is a fresh confirmed reservation. */
export function toRescheduled(r: Reservation, at: Date, rescheduledTo: string): RescheduledReservation {
  const iso = at.toISOString();
  return { ...baseOf(r), state: "rescheduled", rescheduled_at: iso, rescheduled_to: rescheduledTo, updated_at: iso };
}
