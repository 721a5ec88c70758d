import { fileURLToPath } from "node:url";
import type { ResolvedPrice } from "@courtbook/shared-schemas";
import type { Env } from "../config/env.js";
import { createPool } from "../db/pool.js";
import type { Logger } from "../observability/logger.js";
import { LoggerAuditSink, type AuditSink } from "../services/audit/auditSink.js";
import { AvailabilityService } from "../services/availability/availabilityService.js";
import { TtlCache } from "../services/cache/ttlCache.js";
import type { Catalog } from "../services/catalog/catalog.js";
import { PgCatalogStore } from "../services/catalog/catalogStore.js";
import { MemoryCatalogStore } from "../services/catalog/memoryCatalogStore.js";
import { systemClock, type Clock } from "../services/clock.js";
import { IdempotencyLedger } from "../services/idempotency/idempotencyLedger.js";
import { PriceQuoteService } from "../services/pricing/priceQuoteService.js";
import { ConflictChecker } from "../services/reservations/conflictChecker.js";
import { HoldSweeper } from "../services/reservations/holdSweeper.js";
import { MemoryBookingStore } from "../services/reservations/memoryReservationStore.js";
import type { BookingStore } from "../services/reservations/ports.js";
import type { RefundPolicy } from "../services/reservations/refundPolicy.js";
import { PgBookingStore } from "../services/reservations/reservationStore.js";
import { ReservationService } from "../services/reservations/reservationService.js";
import { TariffResolver, type TariffStore } from "../services/tariffs/tariffResolver.js";
import { PgTariffStore } from "../services/tariffs/tariffStore.js";

export type BookingSettings = {
  holdTtlMinutes: number;
  sweepIntervalMs: number;
  tariffCacheTtlMs: number;
  tariffCacheMaxEntries: number;
  refundPolicy: RefundPolicy;
};

export type ServiceParts = {
  catalog: Catalog;
  tariffs: TariffStore;
  store: BookingStore;
  logger: Logger;
  settings: BookingSettings;
  audit?: AuditSink;
  clock?: Clock;
};

export type AppServices = {
  quotes: PriceQuoteService;
  reservations: ReservationService;
  availability: AvailabilityService;
  sweeper: HoldSweeper;
};

export type AppContext = AppServices & {
  apiKey: string;
  readOnly: boolean;
  close(): Promise<void>;
};

const DEMO_CATALOG_PATH = fileURLToPath(new URL("../../data/demo-catalog.json", import.meta.url));

export function settingsFromEnv(env: Env): BookingSettings {
  return {
    holdTtlMinutes: env.HOLD_TTL_MINUTES,
    sweepIntervalMs: env.HOLD_SWEEP_INTERVAL_SECONDS * 1000,
    tariffCacheTtlMs: env.TARIFF_CACHE_TTL_SECONDS * 1000,
    tariffCacheMaxEntries: env.TARIFF_CACHE_MAX_ENTRIES,
    refundPolicy: {
      fullRefundHours: env.CANCEL_FULL_REFUND_HOURS,
      partialRefundPercent: env.CANCEL_PARTIAL_REFUND_PERCENT,
    },
  };
}

export function assembleServices(parts: ServiceParts): AppServices {
  const { catalog, tariffs, store, logger, settings } = parts;
  const clock = parts.clock ?? systemClock;
  const audit = parts.audit ?? new LoggerAuditSink(logger);

  const cache = new TtlCache<Readonly<ResolvedPrice>>({
    ttlMs: settings.tariffCacheTtlMs,
    maxEntries: settings.tariffCacheMaxEntries,
    clock,
  });
  const resolver = new TariffResolver(tariffs, cache);

  return {
    quotes: new PriceQuoteService({ catalog, resolver, audit, clock, logger }),
    reservations: new ReservationService({
      catalog,
      store,
      ledger: new IdempotencyLedger(store, clock),
      resolver,
      conflicts: new ConflictChecker(clock),
      audit,
      clock,
      logger,
      config: { holdTtlMinutes: settings.holdTtlMinutes, refundPolicy: settings.refundPolicy },
    }),
    availability: new AvailabilityService({ catalog, store, clock }),
    sweeper: new HoldSweeper({ store, audit, clock, logger, intervalMs: settings.sweepIntervalMs }),
  };
}

export async function createAppContext(env: Env, logger: Logger): Promise<AppContext> {
  const settings = settingsFromEnv(env);
  const base = { apiKey: env.BACKEND_API_KEY, readOnly: env.DB_READ_ONLY };

  if (env.STORE_DRIVER === "memory") {
    const catalog = await MemoryCatalogStore.fromFile(env.CATALOG_SEED_PATH ?? DEMO_CATALOG_PATH);
    logger.info("using in-memory store");
    const services = assembleServices({
      catalog,
      tariffs: catalog,
      store: new MemoryBookingStore(),
      logger,
      settings,
    });
    return { ...services, ...base, close: async () => undefined };
  }

  const pool = createPool(env);
  const services = assembleServices({
    catalog: new PgCatalogStore(pool),
    tariffs: new PgTariffStore(pool),
    store: new PgBookingStore(pool),
    logger,
    settings,
  });
  return { ...services, ...base, close: () => pool.end() };
}
