import { describe, it, expect } from "vitest";
import type { CreateHoldRequest, RescheduleReservationRequest } from "@courtbook/shared-schemas";
import {
  COURT_1_PRICE,
  FRIDAY,
  THURSDAY,
  client,
  holdRequest,
  makeHarness,
  otherClient,
  staff,
} from "./helpers.js";

describe("ReservationService - createHold", () => {
  it("holds a slot at the court price for the configured TTL", async () => {
    const { services, audit } = makeHarness();
    const outcome = await services.reservations.createHold(holdRequest(), client);

    expect(outcome.replayed).toBe(false);
    expect(outcome.response.state).toBe("hold");
    expect(outcome.response.price).toEqual(COURT_1_PRICE);
    expect(outcome.response.hold_expires_at).toBe("2025-07-30T12:10:00.000Z");
    expect(audit.events).toEqual([
      {
        action: "create_hold",
        outcome: "success",
        actor_id: "client-ana",
        reservation_id: outcome.response.reservation_id,
        at: "2025-07-30T12:00:00.000Z",
      },
    ]);
  });

  it("returns the same hold for a retried key", async () => {
    const { services, store, audit } = makeHarness();
    const first = await services.reservations.createHold(holdRequest(), client);
    const second = await services.reservations.createHold(holdRequest(), client);

    expect(second.replayed).toBe(true);
    expect(second.response).toEqual(first.response);
    expect(await store.reservations.listActiveForCourt("court-1", THURSDAY)).toHaveLength(1);
    expect(audit.events).toHaveLength(1);
  });

  it("scopes keys to the caller", async () => {
    const { services } = makeHarness();
    await services.reservations.createHold(holdRequest(), client);
    await expect(services.reservations.createHold(holdRequest(), otherClient)).rejects.toMatchObject({
      kind: "OverlappingReservation",
    });
  });

  it("lets only one of two concurrent overlapping holds through", async () => {
    const { services, store } = makeHarness();
    const results = await Promise.allSettled([
      services.reservations.createHold(holdRequest({ idempotency_key: "hold-key-a" }), client),
      services.reservations.createHold(
        holdRequest({ idempotency_key: "hold-key-b", start_time: "18:30", end_time: "19:30" }),
        otherClient
      ),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected).toMatchObject({ reason: { kind: "OverlappingReservation" } });
    expect(await store.reservations.listActiveForCourt("court-1", THURSDAY)).toHaveLength(1);
  });

  it("applies the venue buffer between reservations", async () => {
    const { services } = makeHarness();
    await services.reservations.createHold(holdRequest(), client);

    await expect(
      services.reservations.createHold(
        holdRequest({ idempotency_key: "hold-key-002", start_time: "19:00", end_time: "20:00" }),
        client
      )
    ).rejects.toMatchObject({ kind: "OverlappingReservation" });

    const after = await services.reservations.createHold(
      holdRequest({ idempotency_key: "hold-key-003", start_time: "19:15", end_time: "20:15" }),
      client
    );
    expect(after.response.state).toBe("hold");
  });

  it("audits rejections", async () => {
    const { services, audit } = makeHarness();
    await services.reservations.createHold(holdRequest(), client);
    await expect(
      services.reservations.createHold(holdRequest({ idempotency_key: "hold-key-002" }), client)
    ).rejects.toMatchObject({ kind: "OverlappingReservation" });

    expect(audit.events[1]).toMatchObject({
      action: "create_hold",
      outcome: "rejected",
      actor_id: "client-ana",
      kind: "OverlappingReservation",
    });
  });

  it("rejects slots outside the opening hours", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.createHold(holdRequest({ start_time: "21:30", end_time: "22:30" }), client)
    ).rejects.toMatchObject({
      kind: "OutsideOpeningHours",
      details: { weekday: "thursday", opening_hours: ["08:00-22:00"] },
    });
  });

  it("uses the court's own schedule when it has one", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.createHold(
        holdRequest({ court_id: "court-short", start_time: "18:00", end_time: "19:00" }),
        client
      )
    ).rejects.toMatchObject({ kind: "OutsideOpeningHours" });

    const inside = await services.reservations.createHold(
      holdRequest({ court_id: "court-short", start_time: "10:00", end_time: "11:00" }),
      client
    );
    expect(inside.response.price.origin).toBe("sede");
  });

  it("rejects non-reservable courts", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.createHold(holdRequest({ court_id: "court-off" }), client)
    ).rejects.toMatchObject({ kind: "CourtNotReservable" });
  });

  it("rejects unknown venues and courts of another venue", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.createHold(holdRequest({ venue_id: "venue-404" }), client)
    ).rejects.toMatchObject({ kind: "NotFound" });
    await expect(
      services.reservations.createHold(holdRequest({ court_id: "court-404" }), client)
    ).rejects.toMatchObject({ kind: "NotFound" });
    await expect(
      services.reservations.createHold(holdRequest({ court_id: "court-x" }), client)
    ).rejects.toMatchObject({ kind: "ValidationFailed" });
  });

  it("fails without an applicable tariff", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.createHold(holdRequest({ date: FRIDAY }), client)
    ).rejects.toMatchObject({ kind: "NoApplicableTariff", details: { weekday: "friday" } });
  });

  it("reports a broken venue zone as a server fault", async () => {
    const { services, audit } = makeHarness();
    await expect(
      services.reservations.createHold(
        holdRequest({ venue_id: "venue-broken", court_id: "court-broken" }),
        client
      )
    ).rejects.toMatchObject({ kind: "InvalidTimeZone" });
    expect(audit.events[0]).toMatchObject({ outcome: "error", kind: "InvalidTimeZone" });
  });
});

describe("ReservationService - confirm", () => {
  it("confirms a live hold and keeps its price", async () => {
    const { services, clock } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    clock.advanceMinutes(3);

    const confirmed = await services.reservations.confirm(
      { reservation_id: hold.response.reservation_id },
      client
    );
    expect(confirmed.response).toEqual({
      reservation_id: hold.response.reservation_id,
      state: "confirmed",
      confirmed_at: "2025-07-30T12:03:00.000Z",
      price: COURT_1_PRICE,
    });
  });

  it("refuses to confirm twice without a key", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const req = { reservation_id: hold.response.reservation_id };
    await services.reservations.confirm(req, client);

    await expect(services.reservations.confirm(req, client)).rejects.toMatchObject({
      kind: "InvalidState",
      details: { state: "confirmed" },
    });
  });

  it("replays a keyed confirmation", async () => {
    const { services, clock } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const req = { reservation_id: hold.response.reservation_id, idempotency_key: "confirm-key-1" };
    const first = await services.reservations.confirm(req, client);
    clock.advanceMinutes(30);
    const second = await services.reservations.confirm(req, client);

    expect(second.replayed).toBe(true);
    expect(second.response).toEqual(first.response);
  });

  it("refuses a hold that reached its expiry", async () => {
    const { services, clock } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    clock.advanceMinutes(10);

    await expect(
      services.reservations.confirm({ reservation_id: hold.response.reservation_id }, client)
    ).rejects.toMatchObject({ kind: "InvalidState", details: { hold_expired: true } });
  });

  it("checks ownership for clients only", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const req = { reservation_id: hold.response.reservation_id };

    await expect(services.reservations.confirm(req, otherClient)).rejects.toMatchObject({
      kind: "Forbidden",
    });
    const byStaff = await services.reservations.confirm(req, staff);
    expect(byStaff.response.state).toBe("confirmed");
  });

  it("reports unknown reservations", async () => {
    const { services } = makeHarness();
    await expect(
      services.reservations.confirm({ reservation_id: "missing" }, client)
    ).rejects.toMatchObject({ kind: "NotFound" });
  });

  it("refuses to confirm a cancelled reservation", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const reservation_id = hold.response.reservation_id;
    await services.reservations.cancel(
      { reservation_id, reason: "changed plans", idempotency_key: "cancel-key-1" },
      client
    );

    await expect(
      services.reservations.confirm({ reservation_id, idempotency_key: "confirm-key-1" }, client)
    ).rejects.toMatchObject({ kind: "InvalidState", details: { state: "cancelled" } });
  });

  it("refuses to confirm a hold the sweeper expired", async () => {
    const { services, clock } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    clock.advanceMinutes(10);
    await services.sweeper.sweep();

    await expect(
      services.reservations.confirm(
        { reservation_id: hold.response.reservation_id, idempotency_key: "confirm-key-1" },
        client
      )
    ).rejects.toMatchObject({ kind: "InvalidState", details: { state: "expired" } });
  });
});

describe("ReservationService - cancel", () => {
  async function confirmedHold() {
    const harness = makeHarness();
    const hold = await harness.services.reservations.createHold(holdRequest(), client);
    const reservation_id = hold.response.reservation_id;
    await harness.services.reservations.confirm({ reservation_id }, client);
    return { ...harness, reservation_id };
  }

  it("refunds nothing for a hold", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const cancelled = await services.reservations.cancel(
      {
        reservation_id: hold.response.reservation_id,
        reason: "changed plans",
        idempotency_key: "cancel-key-1",
      },
      client
    );
    expect(cancelled.response.refund).toEqual({ type: "none", amount: 0, currency: "COP" });
  });

  it("refunds in full a day or more ahead", async () => {
    const { services, reservation_id } = await confirmedHold();
    const cancelled = await services.reservations.cancel(
      { reservation_id, reason: "injury", idempotency_key: "cancel-key-1" },
      client
    );
    expect(cancelled.response.refund).toEqual({ type: "full", amount: 150000, currency: "COP" });
  });

  it("refunds half when closer to the start", async () => {
    const { services, clock, reservation_id } = await confirmedHold();
    clock.set("2025-07-31T12:00:00.000Z");
    const cancelled = await services.reservations.cancel(
      { reservation_id, reason: "injury", idempotency_key: "cancel-key-1" },
      client
    );
    expect(cancelled.response.refund).toEqual({ type: "partial", amount: 75000, currency: "COP" });
  });

  it("refunds nothing once the slot has started", async () => {
    const { services, clock, reservation_id } = await confirmedHold();
    clock.set("2025-07-31T23:30:00.000Z");
    const cancelled = await services.reservations.cancel(
      { reservation_id, reason: "late", idempotency_key: "cancel-key-1" },
      client
    );
    expect(cancelled.response.refund).toEqual({ type: "none", amount: 0, currency: "COP" });
  });

  it("treats cancelling a cancelled reservation as a no-op", async () => {
    const { services, audit, clock, reservation_id } = await confirmedHold();
    const first = await services.reservations.cancel(
      { reservation_id, reason: "injury", idempotency_key: "cancel-key-1" },
      client
    );
    const auditedBefore = audit.events.length;
    clock.advanceMinutes(5);

    const again = await services.reservations.cancel(
      { reservation_id, reason: "other reason", idempotency_key: "cancel-key-2" },
      client
    );
    expect(again).toEqual({ response: first.response, replayed: false, changed: false });
    expect(audit.events).toHaveLength(auditedBefore);
  });

  it("refuses to cancel an expired hold", async () => {
    const { services, clock } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    clock.advanceMinutes(10);
    await services.sweeper.sweep();

    await expect(
      services.reservations.cancel(
        { reservation_id: hold.response.reservation_id, reason: "late", idempotency_key: "cancel-key-1" },
        client
      )
    ).rejects.toMatchObject({ kind: "InvalidState", details: { state: "expired" } });
  });

  it("frees the slot", async () => {
    const { services, reservation_id } = await confirmedHold();
    await services.reservations.cancel(
      { reservation_id, reason: "injury", idempotency_key: "cancel-key-1" },
      client
    );
    const again = await services.reservations.createHold(
      holdRequest({ idempotency_key: "hold-key-002" }),
      otherClient
    );
    expect(again.response.state).toBe("hold");
  });
});

describe("ReservationService - get", () => {
  it("returns the stored record to its owner and to staff", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    const { reservation } = await services.reservations.get(hold.response.reservation_id, client);

    expect(reservation).toMatchObject({
      state: "hold",
      requested_by: "client-ana",
      court_id: "court-1",
      date: THURSDAY,
      start_time: "18:00",
      end_time: "19:00",
      idempotency_keys: { hold: "hold-key-001", confirm: null, cancel: null },
    });
    await expect(
      services.reservations.get(hold.response.reservation_id, staff)
    ).resolves.toMatchObject({ reservation: { state: "hold" } });
  });

  it("hides other clients' reservations", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    await expect(
      services.reservations.get(hold.response.reservation_id, otherClient)
    ).rejects.toMatchObject({ kind: "Forbidden" });
    await expect(services.reservations.get("missing", client)).rejects.toMatchObject({
      kind: "NotFound",
    });
  });
});

describe("ReservationService - reschedule", () => {
  async function confirmedHold(overrides: Partial<CreateHoldRequest> = {}) {
    const harness = makeHarness();
    const hold = await harness.services.reservations.createHold(holdRequest(overrides), client);
    const reservation_id = hold.response.reservation_id;
    await harness.services.reservations.confirm({ reservation_id }, client);
    return { ...harness, reservation_id };
  }

  function moveTo(
    reservation_id: string,
    overrides: Partial<RescheduleReservationRequest> = {}
  ): RescheduleReservationRequest {
    return {
      reservation_id,
      court_id: "court-2",
      date: THURSDAY,
      start_time: "20:00",
      end_time: "21:00",
      idempotency_key: "move-key-001",
      ...overrides,
    };
  }

  it("moves a confirmed reservation to a new slot at that slot's price", async () => {
    const { services, audit, reservation_id } = await confirmedHold();
    const outcome = await services.reservations.reschedule(moveTo(reservation_id), client);
    const moved_id = outcome.response.reservation.reservation_id;

    expect(outcome.replayed).toBe(false);
    expect(outcome.response).toEqual({
      original_reservation_id: reservation_id,
      reservation: {
        reservation_id: moved_id,
        state: "confirmed",
        court_id: "court-2",
        date: THURSDAY,
        start_time: "20:00",
        end_time: "21:00",
        price: { origin: "sede", tariff_id: "t-venue-1-thu", currency: "COP", price_per_block: 120000 },
      },
      price_difference: { type: "partial_refund", amount: 30000, currency: "COP" },
    });

    const original = await services.reservations.get(reservation_id, client);
    expect(original.reservation).toMatchObject({
      state: "rescheduled",
      rescheduled_to: moved_id,
      rescheduled_at: "2025-07-30T12:00:00.000Z",
    });
    expect(original.history[0]).toEqual({
      reservation_id,
      from_state: "confirmed",
      to_state: "rescheduled",
      actor_id: "client-ana",
      at: "2025-07-30T12:00:00.000Z",
      note: `rescheduled to ${moved_id}`,
    });

    const moved = await services.reservations.get(moved_id, client);
    expect(moved.reservation).toMatchObject({
      state: "confirmed",
      requested_by: "client-ana",
      rescheduled_from: reservation_id,
    });
    expect(moved.history).toEqual([
      {
        reservation_id: moved_id,
        from_state: null,
        to_state: "confirmed",
        actor_id: "client-ana",
        at: "2025-07-30T12:00:00.000Z",
        note: `rescheduled from ${reservation_id}`,
      },
    ]);
    expect(audit.events.at(-1)).toMatchObject({
      action: "reschedule",
      outcome: "success",
      reservation_id,
    });
  });

  it("frees the slot it leaves", async () => {
    const { services, reservation_id } = await confirmedHold();
    await services.reservations.reschedule(moveTo(reservation_id), client);

    const taken = await services.reservations.createHold(
      holdRequest({ idempotency_key: "hold-key-002" }),
      otherClient
    );
    expect(taken.response.state).toBe("hold");
  });

  it("may overlap the slot it is leaving", async () => {
    const { services, reservation_id } = await confirmedHold();
    const outcome = await services.reservations.reschedule(
      moveTo(reservation_id, { court_id: "court-1", start_time: "18:30", end_time: "19:30" }),
      client
    );
    expect(outcome.response.price_difference).toEqual({
      type: "no_change",
      amount: 0,
      currency: "COP",
    });
  });

  it("charges the difference when the new slot costs more", async () => {
    const { services, reservation_id } = await confirmedHold({
      court_id: "court-2",
      start_time: "10:00",
      end_time: "11:00",
    });
    const outcome = await services.reservations.reschedule(
      moveTo(reservation_id, { court_id: "court-1", start_time: "18:00", end_time: "19:00" }),
      client
    );
    expect(outcome.response.price_difference).toEqual({
      type: "additional_charge",
      amount: 30000,
      currency: "COP",
    });
  });

  it("keeps the current court when none is given", async () => {
    const { services, reservation_id } = await confirmedHold();
    const outcome = await services.reservations.reschedule(
      moveTo(reservation_id, { court_id: undefined }),
      client
    );
    expect(outcome.response.reservation.court_id).toBe("court-1");
  });

  it("leaves the reservation untouched when the new slot is taken", async () => {
    const { services, reservation_id } = await confirmedHold();
    await services.reservations.createHold(
      holdRequest({ court_id: "court-2", start_time: "20:00", end_time: "21:00", idempotency_key: "hold-key-b" }),
      otherClient
    );

    await expect(
      services.reservations.reschedule(moveTo(reservation_id), client)
    ).rejects.toMatchObject({ kind: "OverlappingReservation" });
    const { reservation } = await services.reservations.get(reservation_id, client);
    expect(reservation.state).toBe("confirmed");
  });

  it("replays a retried key without moving twice", async () => {
    const { services, store, reservation_id } = await confirmedHold();
    const first = await services.reservations.reschedule(moveTo(reservation_id), client);
    const second = await services.reservations.reschedule(moveTo(reservation_id), client);

    expect(second.replayed).toBe(true);
    expect(second.response).toEqual(first.response);
    expect(await store.reservations.listActiveForCourt("court-2", THURSDAY)).toHaveLength(1);
  });

  it("moves only confirmed reservations", async () => {
    const { services } = makeHarness();
    const hold = await services.reservations.createHold(holdRequest(), client);
    await expect(
      services.reservations.reschedule(moveTo(hold.response.reservation_id), client)
    ).rejects.toMatchObject({ kind: "InvalidState", details: { state: "hold" } });
  });

  it("refuses once the reservation has started", async () => {
    const { services, clock, reservation_id } = await confirmedHold();
    clock.set("2025-07-31T23:00:00.000Z");
    await expect(
      services.reservations.reschedule(moveTo(reservation_id), client)
    ).rejects.toMatchObject({ kind: "InvalidState", details: { started: true } });
  });

  it("stays within the venue and checks ownership", async () => {
    const { services, reservation_id } = await confirmedHold();
    await expect(
      services.reservations.reschedule(moveTo(reservation_id, { court_id: "court-x" }), client)
    ).rejects.toMatchObject({ kind: "ValidationFailed" });
    await expect(
      services.reservations.reschedule(moveTo(reservation_id), otherClient)
    ).rejects.toMatchObject({ kind: "Forbidden" });

    const byStaff = await services.reservations.reschedule(moveTo(reservation_id), staff);
    const { reservation } = await services.reservations.get(
      byStaff.response.reservation.reservation_id,
      client
    );
    expect(reservation.requested_by).toBe("client-ana");
  });
});

describe("ReservationService - full lifecycle", () => {
  it("holds, confirms with a fresh key, cancels and replays the cancellation", async () => {
    const { services, audit, clock } = makeHarness();

    const hold = await services.reservations.createHold(holdRequest(), client);
    expect(hold.response.price.price_per_block).toBe(150000);
    const reservation_id = hold.response.reservation_id;

    clock.advanceMinutes(2);
    const confirmed = await services.reservations.confirm(
      { reservation_id, idempotency_key: "confirm-key-1" },
      client
    );
    expect(confirmed.replayed).toBe(false);
    expect(confirmed.response.confirmed_at).toBe("2025-07-30T12:02:00.000Z");

    clock.advanceMinutes(3);
    const cancelReq = { reservation_id, reason: "no-show", idempotency_key: "cancel-key-1" };
    const cancelled = await services.reservations.cancel(cancelReq, client);
    expect(cancelled.response).toMatchObject({
      state: "cancelled",
      cancellation_reason: "no-show",
      refund: { type: "full", amount: 150000, currency: "COP" },
    });
    expect(audit.events.map((e) => e.action)).toEqual(["create_hold", "confirm", "cancel"]);

    const replay = await services.reservations.cancel(cancelReq, client);
    expect(replay.replayed).toBe(true);
    expect(replay.response).toEqual(cancelled.response);
    expect(audit.events).toHaveLength(3);

    const { reservation, history } = await services.reservations.get(reservation_id, client);
    expect(reservation.state).toBe("cancelled");
    expect(reservation.price).toEqual(COURT_1_PRICE);
    expect(reservation.idempotency_keys).toEqual({
      hold: "hold-key-001",
      confirm: "confirm-key-1",
      cancel: "cancel-key-1",
    });
    expect(history).toEqual([
      {
        reservation_id,
        from_state: "confirmed",
        to_state: "cancelled",
        actor_id: "client-ana",
        at: "2025-07-30T12:05:00.000Z",
        note: "no-show",
      },
      {
        reservation_id,
        from_state: "hold",
        to_state: "confirmed",
        actor_id: "client-ana",
        at: "2025-07-30T12:02:00.000Z",
        note: null,
      },
      {
        reservation_id,
        from_state: null,
        to_state: "hold",
        actor_id: "client-ana",
        at: "2025-07-30T12:00:00.000Z",
        note: null,
      },
    ]);
  });
});
