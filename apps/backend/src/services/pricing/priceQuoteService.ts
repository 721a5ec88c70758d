import type { Actor, ResolvePriceRequest, ResolvePriceResponse } from "@courtbook/shared-schemas";
import type { Logger } from "../../observability/logger.js";
import { failureEvent, recordSafely, type AuditSink } from "../audit/auditSink.js";
import { requireVenue, requireVenueCourt, type Catalog } from "../catalog/catalog.js";
import type { Clock } from "../clock.js";
import type { TariffResolver } from "../tariffs/tariffResolver.js";

export type PriceQuoteServiceDeps = {
  catalog: Catalog;
  resolver: TariffResolver;
  audit: AuditSink;
  clock: Clock;
  logger: Logger;
};

export class PriceQuoteService {
  constructor(private readonly deps: PriceQuoteServiceDeps) {}

  async quote(req: ResolvePriceRequest, actor: Actor): Promise<ResolvePriceResponse> {
    const { catalog, resolver, audit, clock, logger } = this.deps;
    try {
      const venue = req.court_id
        ? (await requireVenueCourt(catalog, req.venue_id, req.court_id)).venue
        : await requireVenue(catalog, req.venue_id);
      const price = await resolver.resolve(
        venue,
        req.court_id ?? null,
        req.date,
        req.start_time,
        req.end_time
      );
      return { ...price };
    } catch (err) {
      const event = failureEvent("resolve_price", actor.actor_id, undefined, err, clock());
      if (event.outcome === "error") logger.error({ err }, "price resolution failed");
      await recordSafely(audit, logger, event);
      throw err;
    }
  }
}
