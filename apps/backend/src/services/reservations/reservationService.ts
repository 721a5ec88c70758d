import { randomUUID } from "node:crypto";
import {
  CancelReservationResponseSchema,
  ConfirmReservationResponseSchema,
  CreateHoldResponseSchema,
  RescheduleReservationResponseSchema,
  type Actor,
  type CancelReservationRequest,
  type CancelReservationResponse,
  type CancelledReservation,
  type ConfirmReservationRequest,
  type ConfirmReservationResponse,
  type ConfirmedReservation,
  type Court,
  type CreateHoldRequest,
  type CreateHoldResponse,
  type GetReservationDetailsResponse,
  type HoldReservation,
  type RescheduleReservationRequest,
  type RescheduleReservationResponse,
  type Reservation,
  type ResolvedPrice,
  type Venue,
} from "@courtbook/shared-schemas";
import { BookingError } from "../../domain/errors.js";
import { normalizeSlot, type NormalizedSlot } from "../../domain/localTime.js";
import {
  coversInterval,
  effectiveOpeningHours,
  openingRanges,
} from "../../domain/openingHours.js";
import {
  canTransition,
  isHoldExpired,
  toCancelled,
  toConfirmed,
  toRescheduled,
} from "../../domain/reservationStateMachine.js";
import type { Logger } from "../../observability/logger.js";
import {
  failureEvent,
  recordSafely,
  type AuditAction,
  type AuditEvent,
  type AuditSink,
} from "../audit/auditSink.js";
import { requireVenue, requireVenueCourt, type Catalog } from "../catalog/catalog.js";
import type { Clock } from "../clock.js";
import type { IdempotencyLedger, LedgerOutcome } from "../idempotency/idempotencyLedger.js";
import type { TariffResolver } from "../tariffs/tariffResolver.js";
import type { ConflictChecker } from "./conflictChecker.js";
import type { BookingStore, ReservationRepository } from "./ports.js";
import { computeRefund, priceDifference, type RefundPolicy } from "./refundPolicy.js";

export type ReservationServiceConfig = {
  holdTtlMinutes: number;
  refundPolicy: RefundPolicy;
};

export type ReservationServiceDeps = {
  catalog: Catalog;
  store: BookingStore;
  ledger: IdempotencyLedger;
  resolver: TariffResolver;
  conflicts: ConflictChecker;
  audit: AuditSink;
  clock: Clock;
  logger: Logger;
  config: ReservationServiceConfig;
};

export function normalizeOrThrow(
  venue: Venue,
  date: string,
  start_time: string,
  end_time: string
): NormalizedSlot {
  const normalized = normalizeSlot(venue.timezone, date, start_time, end_time);
  if (normalized.ok) return normalized.slot;
  if (normalized.error === "InvalidTimeZone") {
    throw new BookingError("InvalidTimeZone", normalized.message, {
      venue_id: venue.venue_id,
      timezone: venue.timezone,
    });
  }
  throw new BookingError("ValidationFailed", normalized.message, { start_time, end_time });
}

export function assertCanAct(actor: Actor, reservation: Reservation): void {
  if (actor.role === "client" && reservation.requested_by !== actor.actor_id) {
    throw new BookingError("Forbidden", "Reservation belongs to another client", {
      reservation_id: reservation.reservation_id,
    });
  }
}

type PreparedSlot = {
  venue: Venue;
  court: Court;
  price: Readonly<ResolvedPrice>;
};

async function requireReservation(
  repo: ReservationRepository,
  reservation_id: string,
  forUpdate = false
): Promise<Reservation> {
  const reservation = await repo.findById(reservation_id, { forUpdate });
  if (!reservation) throw new BookingError("NotFound", "Reservation not found", { reservation_id });
  return reservation;
}

function cancelledResponse(r: CancelledReservation): CancelReservationResponse {
  return {
    reservation_id: r.reservation_id,
    state: "cancelled",
    cancelled_at: r.cancelled_at,
    cancellation_reason: r.cancellation_reason,
    refund: r.refund,
  };
}

/**
 * Hold, confirm, cancel and reschedule, each behind the idempotency ledger.
 * Catalog and tariff reads run before the ledger opens its transaction;
 * inside it only the booking store is touched.
 */
export class ReservationService {
  constructor(private readonly deps: ReservationServiceDeps) {}

  async createHold(req: CreateHoldRequest, actor: Actor): Promise<LedgerOutcome<CreateHoldResponse>> {
    const { ledger, conflicts, clock, config } = this.deps;
    return this.audited("create_hold", actor, undefined, (res) => res.reservation_id, async () => {
      const { venue, court, price } = await this.prepareSlot(
        req.venue_id,
        req.court_id,
        req.date,
        req.start_time,
        req.end_time
      );

      return ledger.getOrCreate(
        { operation: "create_hold", idempotency_key: req.idempotency_key, identity: actor.actor_id },
        CreateHoldResponseSchema,
        async (uow) => {
          await uow.lockCourt(court.court_id);
          const clashes = await conflicts.findConflicts(uow.reservations, {
            court_id: court.court_id,
            date: req.date,
            start_time: req.start_time,
            end_time: req.end_time,
            buffer_minutes: venue.buffer_minutes,
          });
          if (clashes.length > 0) {
            throw new BookingError("OverlappingReservation", "Slot is already taken", {
              court_id: court.court_id,
              date: req.date,
              start_time: req.start_time,
              end_time: req.end_time,
              buffer_minutes: venue.buffer_minutes,
            });
          }

          const now = clock();
          const hold: HoldReservation = {
            reservation_id: randomUUID(),
            venue_id: venue.venue_id,
            court_id: court.court_id,
            requested_by: actor.actor_id,
            date: req.date,
            start_time: req.start_time,
            end_time: req.end_time,
            price: { ...price },
            idempotency_keys: { hold: req.idempotency_key, confirm: null, cancel: null },
            created_at: now.toISOString(),
            updated_at: now.toISOString(),
            state: "hold",
            hold_expires_at: new Date(now.getTime() + config.holdTtlMinutes * 60_000).toISOString(),
          };
          await uow.reservations.insert(hold);
          await uow.history.append({
            reservation_id: hold.reservation_id,
            from_state: null,
            to_state: "hold",
            actor_id: actor.actor_id,
            at: hold.created_at,
            note: null,
          });

          const response: CreateHoldResponse = {
            reservation_id: hold.reservation_id,
            state: "hold",
            hold_expires_at: hold.hold_expires_at,
            price: hold.price,
          };
          return { reservation_id: hold.reservation_id, response };
        }
      );
    });
  }

  async confirm(
    req: ConfirmReservationRequest,
    actor: Actor
  ): Promise<LedgerOutcome<ConfirmReservationResponse>> {
    const { ledger, clock } = this.deps;
    const key = req.idempotency_key ?? null;
    const scope = key ? { operation: "confirm" as const, idempotency_key: key, identity: actor.actor_id } : null;

    return this.audited("confirm", actor, req.reservation_id, (res) => res.reservation_id, () =>
      ledger.getOrCreate(scope, ConfirmReservationResponseSchema, async (uow) => {
        const current = await requireReservation(uow.reservations, req.reservation_id, true);
        assertCanAct(actor, current);

        const now = clock();
        if (!canTransition(current.state, "confirmed")) {
          throw new BookingError("InvalidState", `Cannot confirm a ${current.state} reservation`, {
            state: current.state,
          });
        }
        if (isHoldExpired(current, now)) {
          throw new BookingError("InvalidState", "Hold has expired", {
            state: current.state,
            hold_expired: true,
          });
        }

        const next = toConfirmed(current, now, key);
        if (!(await uow.reservations.transition(next, current.state))) {
          throw new BookingError("InvalidState", "Reservation changed concurrently", {
            reservation_id: current.reservation_id,
          });
        }
        await uow.history.append({
          reservation_id: next.reservation_id,
          from_state: current.state,
          to_state: "confirmed",
          actor_id: actor.actor_id,
          at: next.confirmed_at,
          note: null,
        });

        const response: ConfirmReservationResponse = {
          reservation_id: next.reservation_id,
          state: "confirmed",
          confirmed_at: next.confirmed_at,
          price: next.price,
        };
        return { reservation_id: next.reservation_id, response };
      })
    );
  }

  async cancel(
    req: CancelReservationRequest,
    actor: Actor
  ): Promise<LedgerOutcome<CancelReservationResponse>> {
    const { ledger, store, catalog, clock, config } = this.deps;

    return this.audited("cancel", actor, req.reservation_id, (res) => res.reservation_id, async () => {
      const existing = await requireReservation(store.reservations, req.reservation_id);
      const venue = await requireVenue(catalog, existing.venue_id);

      return ledger.getOrCreate(
        { operation: "cancel", idempotency_key: req.idempotency_key, identity: actor.actor_id },
        CancelReservationResponseSchema,
        async (uow) => {
          const current = await requireReservation(uow.reservations, req.reservation_id, true);
          assertCanAct(actor, current);

          if (current.state === "cancelled") {
            return {
              reservation_id: current.reservation_id,
              response: cancelledResponse(current),
              changed: false,
            };
          }

          const now = clock();
          if (!canTransition(current.state, "cancelled")) {
            throw new BookingError("InvalidState", `Cannot cancel a ${current.state} reservation`, {
              state: current.state,
            });
          }
          if (isHoldExpired(current, now)) {
            throw new BookingError("InvalidState", "Hold has expired", {
              state: current.state,
              hold_expired: true,
            });
          }

          const slot = normalizeOrThrow(venue, current.date, current.start_time, current.end_time);
          const refund = computeRefund(current, slot.starts_at, now, config.refundPolicy);

          const next = toCancelled(current, now, req.reason, refund, req.idempotency_key);
          if (!(await uow.reservations.transition(next, current.state))) {
            throw new BookingError("InvalidState", "Reservation changed concurrently", {
              reservation_id: current.reservation_id,
            });
          }
          await uow.history.append({
            reservation_id: next.reservation_id,
            from_state: current.state,
            to_state: "cancelled",
            actor_id: actor.actor_id,
            at: next.cancelled_at,
            note: req.reason,
          });
          return { reservation_id: next.reservation_id, response: cancelledResponse(next) };
        }
      );
    });
  }

  /**
   * Moves a confirmed reservation that has not started yet to a new slot in
   * the same venue. The original row becomes `rescheduled` and a new
   * confirmed reservation takes the slot at the slot's own price.
   */
  async reschedule(
    req: RescheduleReservationRequest,
    actor: Actor
  ): Promise<LedgerOutcome<RescheduleReservationResponse>> {
    const { ledger, store, conflicts, clock } = this.deps;

    return this.audited(
      "reschedule",
      actor,
      req.reservation_id,
      (res) => res.original_reservation_id,
      async () => {
        const existing = await requireReservation(store.reservations, req.reservation_id);
        assertCanAct(actor, existing);
        const { venue, court, price } = await this.prepareSlot(
          existing.venue_id,
          req.court_id ?? existing.court_id,
          req.date,
          req.start_time,
          req.end_time
        );

        return ledger.getOrCreate(
          { operation: "reschedule", idempotency_key: req.idempotency_key, identity: actor.actor_id },
          RescheduleReservationResponseSchema,
          async (uow) => {
            const current = await requireReservation(uow.reservations, req.reservation_id, true);
            assertCanAct(actor, current);

            const now = clock();
            if (!canTransition(current.state, "rescheduled")) {
              throw new BookingError("InvalidState", `Cannot reschedule a ${current.state} reservation`, {
                state: current.state,
              });
            }
            const booked = normalizeOrThrow(venue, current.date, current.start_time, current.end_time);
            if (booked.starts_at.getTime() <= now.getTime()) {
              throw new BookingError("InvalidState", "Reservation has already started", {
                state: current.state,
                started: true,
              });
            }

            await uow.lockCourt(court.court_id);
            const clashes = await conflicts.findConflicts(uow.reservations, {
              court_id: court.court_id,
              date: req.date,
              start_time: req.start_time,
              end_time: req.end_time,
              buffer_minutes: venue.buffer_minutes,
              exclude_reservation_id: current.reservation_id,
            });
            if (clashes.length > 0) {
              throw new BookingError("OverlappingReservation", "Slot is already taken", {
                court_id: court.court_id,
                date: req.date,
                start_time: req.start_time,
                end_time: req.end_time,
                buffer_minutes: venue.buffer_minutes,
              });
            }

            const iso = now.toISOString();
            const moved: ConfirmedReservation = {
              reservation_id: randomUUID(),
              venue_id: venue.venue_id,
              court_id: court.court_id,
              requested_by: current.requested_by,
              date: req.date,
              start_time: req.start_time,
              end_time: req.end_time,
              price: { ...price },
              idempotency_keys: { hold: req.idempotency_key, confirm: null, cancel: null },
              rescheduled_from: current.reservation_id,
              created_at: iso,
              updated_at: iso,
              state: "confirmed",
              confirmed_at: iso,
            };
            await uow.reservations.insert(moved);

            const previous = toRescheduled(current, now, moved.reservation_id);
            if (!(await uow.reservations.transition(previous, current.state))) {
              throw new BookingError("InvalidState", "Reservation changed concurrently", {
                reservation_id: current.reservation_id,
              });
            }

            await uow.history.append({
              reservation_id: previous.reservation_id,
              from_state: current.state,
              to_state: "rescheduled",
              actor_id: actor.actor_id,
              at: iso,
              note: `rescheduled to ${moved.reservation_id}`,
            });
            await uow.history.append({
              reservation_id: moved.reservation_id,
              from_state: null,
              to_state: "confirmed",
              actor_id: actor.actor_id,
              at: iso,
              note: `rescheduled from ${previous.reservation_id}`,
            });

            const response: RescheduleReservationResponse = {
              original_reservation_id: previous.reservation_id,
              reservation: {
                reservation_id: moved.reservation_id,
                state: "confirmed",
                court_id: moved.court_id,
                date: moved.date,
                start_time: moved.start_time,
                end_time: moved.end_time,
                price: moved.price,
              },
              price_difference: priceDifference(current.price, moved.price),
            };
            return { reservation_id: moved.reservation_id, response };
          }
        );
      }
    );
  }

  async get(reservation_id: string, actor: Actor): Promise<GetReservationDetailsResponse> {
    const { store } = this.deps;
    try {
      const reservation = await requireReservation(store.reservations, reservation_id);
      assertCanAct(actor, reservation);
      return { reservation, history: await store.history.listFor(reservation_id) };
    } catch (err) {
      await this.recordFailure("get_reservation", actor, reservation_id, err);
      throw err;
    }
  }

  /** Venue, court, opening hours and price for a requested slot. */
  private async prepareSlot(
    venue_id: string,
    court_id: string,
    date: string,
    start_time: string,
    end_time: string
  ): Promise<PreparedSlot> {
    const { catalog, resolver } = this.deps;
    const { venue, court } = await requireVenueCourt(catalog, venue_id, court_id);
    const slot = normalizeOrThrow(venue, date, start_time, end_time);

    const hours = effectiveOpeningHours(venue, court);
    const interval = { start: slot.start_minutes, end: slot.end_minutes };
    if (!coversInterval(openingRanges(hours, slot.weekday), interval)) {
      throw new BookingError("OutsideOpeningHours", "Requested interval is outside opening hours", {
        weekday: slot.weekday,
        opening_hours: hours[slot.weekday] ?? [],
      });
    }
    if (!court.reservable) {
      throw new BookingError("CourtNotReservable", "Court is not open for reservations", {
        court_id: court.court_id,
      });
    }

    const price = await resolver.resolve(venue, court.court_id, date, start_time, end_time);
    return { venue, court, price };
  }

  private async audited<T>(
    action: AuditAction,
    actor: Actor,
    reservation_id: string | undefined,
    idOf: (response: T) => string,
    run: () => Promise<LedgerOutcome<T>>
  ): Promise<LedgerOutcome<T>> {
    let outcome: LedgerOutcome<T>;
    try {
      outcome = await run();
    } catch (err) {
      await this.recordFailure(action, actor, reservation_id, err);
      throw err;
    }
    // Replays and no-op cancels changed nothing.
    if (!outcome.replayed && outcome.changed) {
      await this.record({
        action,
        outcome: "success",
        actor_id: actor.actor_id,
        reservation_id: idOf(outcome.response),
        at: this.deps.clock().toISOString(),
      });
    } else {
      this.deps.logger.debug({ action, replayed: outcome.replayed }, "no state change");
    }
    return outcome;
  }

  private async recordFailure(
    action: AuditAction,
    actor: Actor,
    reservation_id: string | undefined,
    err: unknown
  ): Promise<void> {
    const { audit, clock, logger } = this.deps;
    const event = failureEvent(action, actor.actor_id, reservation_id, err, clock());
    if (event.outcome === "error") logger.error({ err, action }, "reservation operation failed");
    await recordSafely(audit, logger, event);
  }

  private async record(event: AuditEvent): Promise<void> {
    await recordSafely(this.deps.audit, this.deps.logger, event);
  }
}
