import type {
  Actor,
  CancelledReservation,
  ConfirmedReservation,
  CreateHoldRequest,
  ExpiredReservation,
  HoldReservation,
  PendingReservation,
  ReservationBase,
  ResolvedPrice,
  Tariff,
} from "@courtbook/shared-schemas";
import pino from "pino";
import type { AppContext, BookingSettings } from "../../src/app/context.js";
import { assembleServices } from "../../src/app/context.js";
import type { AuditEvent, AuditSink } from "../../src/services/audit/auditSink.js";
import {
  MemoryCatalogStore,
  type CatalogSeed,
} from "../../src/services/catalog/memoryCatalogStore.js";
import { MemoryBookingStore } from "../../src/services/reservations/memoryReservationStore.js";
import type { TariffQuery, TariffStore } from "../../src/services/tariffs/tariffResolver.js";

export const silentLogger = pino({ level: "silent" });

export class FakeClock {
  private ms: number;

  constructor(iso: string) {
    this.ms = Date.parse(iso);
  }

  readonly now = (): Date => new Date(this.ms);

  advanceMinutes(minutes: number): void {
    this.ms += minutes * 60_000;
  }

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  async record(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }
}

export class CountingTariffStore implements TariffStore {
  calls = 0;

  constructor(private readonly inner: TariffStore) {}

  async listApplicable(query: TariffQuery): Promise<Tariff[]> {
    this.calls += 1;
    return this.inner.listApplicable(query);
  }
}

// 2025-07-31 is a Thursday; 18:00 in Bogota is 23:00Z.
export const THURSDAY = "2025-07-31";
export const FRIDAY = "2025-08-01";
export const SUNDAY = "2025-08-03";
export const START_OF_TEST = "2025-07-30T12:00:00.000Z";

export const client: Actor = { actor_id: "client-ana", role: "client" };
export const otherClient: Actor = { actor_id: "client-luis", role: "client" };
export const staff: Actor = { actor_id: "staff-1", role: "staff" };

const weekday = ["08:00-22:00"];

export function catalogSeed(): CatalogSeed {
  return {
    venues: [
      {
        venue_id: "venue-1",
        name: "Club Norte",
        timezone: "America/Bogota",
        opening_hours: {
          monday: weekday,
          tuesday: weekday,
          wednesday: weekday,
          thursday: weekday,
          friday: weekday,
          saturday: ["08:00-18:00"],
        },
        buffer_minutes: 15,
      },
      {
        venue_id: "venue-2",
        name: "Club Sur",
        timezone: "America/Bogota",
        opening_hours: { thursday: weekday },
        buffer_minutes: 0,
      },
      {
        venue_id: "venue-broken",
        name: "Club Roto",
        timezone: "Mars/Olympus",
        opening_hours: { thursday: weekday },
        buffer_minutes: 0,
      },
    ],
    courts: [
      { court_id: "court-1", venue_id: "venue-1", name: "Cancha 1", reservable: true },
      { court_id: "court-2", venue_id: "venue-1", name: "Cancha 2", reservable: true },
      { court_id: "court-off", venue_id: "venue-1", name: "Cancha 5", reservable: false },
      {
        court_id: "court-short",
        venue_id: "venue-1",
        name: "Cancha 6",
        reservable: true,
        opening_hours: { thursday: ["10:00-12:00"] },
      },
      { court_id: "court-x", venue_id: "venue-2", name: "Cancha X", reservable: true },
      { court_id: "court-broken", venue_id: "venue-broken", name: "Cancha R", reservable: true },
    ],
    tariffs: [
      {
        tariff_id: "t-venue-1-thu",
        scope: "venue",
        venue_id: "venue-1",
        court_id: null,
        weekday: "thursday",
        start_time: "08:00",
        end_time: "22:00",
        currency: "COP",
        price_per_block: 120000,
        created_at: "2025-01-01T00:00:00.000Z",
      },
      {
        tariff_id: "t-court-1-thu",
        scope: "court",
        venue_id: "venue-1",
        court_id: "court-1",
        weekday: "thursday",
        start_time: "18:00",
        end_time: "22:00",
        currency: "COP",
        price_per_block: 150000,
        created_at: "2025-01-01T00:00:00.000Z",
      },
      {
        tariff_id: "t-broken-thu",
        scope: "venue",
        venue_id: "venue-broken",
        court_id: null,
        weekday: "thursday",
        start_time: "08:00",
        end_time: "22:00",
        currency: "COP",
        price_per_block: 90000,
        created_at: "2025-01-01T00:00:00.000Z",
      },
    ],
  };
}

export const COURT_1_PRICE: ResolvedPrice = {
  origin: "cancha",
  tariff_id: "t-court-1-thu",
  currency: "COP",
  price_per_block: 150000,
};

export const testSettings: BookingSettings = {
  holdTtlMinutes: 10,
  sweepIntervalMs: 60_000,
  tariffCacheTtlMs: 5 * 60_000,
  tariffCacheMaxEntries: 100,
  refundPolicy: { fullRefundHours: 24, partialRefundPercent: 50 },
};

export function makeHarness(opts: { readOnly?: boolean; seed?: CatalogSeed } = {}) {
  const clock = new FakeClock(START_OF_TEST);
  const audit = new MemoryAuditSink();
  const catalog = new MemoryCatalogStore(opts.seed ?? catalogSeed());
  const tariffs = new CountingTariffStore(catalog);
  const store = new MemoryBookingStore();
  const services = assembleServices({
    catalog,
    tariffs,
    store,
    logger: silentLogger,
    settings: testSettings,
    audit,
    clock: clock.now,
  });
  const ctx: AppContext = {
    ...services,
    apiKey: "test-api-key",
    readOnly: opts.readOnly ?? false,
    close: async () => undefined,
  };
  return { clock, audit, catalog, tariffs, store, services, ctx };
}

export function holdRequest(overrides: Partial<CreateHoldRequest> = {}): CreateHoldRequest {
  return {
    venue_id: "venue-1",
    court_id: "court-1",
    date: THURSDAY,
    start_time: "18:00",
    end_time: "19:00",
    idempotency_key: "hold-key-001",
    ...overrides,
  };
}

function reservationBase(): ReservationBase {
  return {
    reservation_id: "r-1",
    venue_id: "venue-1",
    court_id: "court-1",
    requested_by: client.actor_id,
    date: THURSDAY,
    start_time: "18:00",
    end_time: "19:00",
    price: COURT_1_PRICE,
    idempotency_keys: { hold: "hold-key-001", confirm: null, cancel: null },
    created_at: START_OF_TEST,
    updated_at: START_OF_TEST,
  };
}

export function holdReservation(overrides: Partial<HoldReservation> = {}): HoldReservation {
  return {
    ...reservationBase(),
    state: "hold",
    hold_expires_at: "2025-07-30T12:10:00.000Z",
    ...overrides,
  };
}

export function pendingReservation(overrides: Partial<PendingReservation> = {}): PendingReservation {
  return { ...reservationBase(), state: "pending", ...overrides };
}

export function confirmedReservation(
  overrides: Partial<ConfirmedReservation> = {}
): ConfirmedReservation {
  return { ...reservationBase(), state: "confirmed", confirmed_at: START_OF_TEST, ...overrides };
}

export function cancelledReservation(
  overrides: Partial<CancelledReservation> = {}
): CancelledReservation {
  return {
    ...reservationBase(),
    state: "cancelled",
    cancelled_at: START_OF_TEST,
    cancellation_reason: "rain",
    refund: { type: "none", amount: 0, currency: "COP" },
    ...overrides,
  };
}

export function expiredReservation(overrides: Partial<ExpiredReservation> = {}): ExpiredReservation {
  return { ...reservationBase(), state: "expired", expired_at: START_OF_TEST, ...overrides };
}
