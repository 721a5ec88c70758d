import type { ResolvedPrice, Tariff, Venue, Weekday } from "@courtbook/shared-schemas";
import { BookingError } from "../../domain/errors.js";
import { normalizeSlot } from "../../domain/localTime.js";
import type { TtlCache } from "../cache/ttlCache.js";

export type TariffQuery = {
  venue_id: string;
  court_id: string | null;
  weekday: Weekday;
  start_time: string;
  end_time: string;
};

/** Returns tariffs of both scopes whose weekday and window cover the query. */
export interface TariffStore {
  listApplicable(query: TariffQuery): Promise<Tariff[]>;
}

const newestFirst = (a: Tariff, b: Tariff) => Date.parse(b.created_at) - Date.parse(a.created_at);

export function pickTariff(candidates: Tariff[], court_id: string | null): ResolvedPrice | null {
  const courtScoped = court_id
    ? candidates.filter((t) => t.scope === "court" && t.court_id === court_id).sort(newestFirst)
    : [];
  const venueScoped = candidates.filter((t) => t.scope === "venue").sort(newestFirst);

  const [court] = courtScoped;
  if (court) {
    return {
      origin: "cancha",
      tariff_id: court.tariff_id,
      currency: court.currency,
      price_per_block: court.price_per_block,
    };
  }
  const [venue] = venueScoped;
  if (venue) {
    return {
      origin: "sede",
      tariff_id: venue.tariff_id,
      currency: venue.currency,
      price_per_block: venue.price_per_block,
    };
  }
  return null;
}

export class TariffResolver {
  private readonly inFlight = new Map<string, Promise<Readonly<ResolvedPrice>>>();

  constructor(
    private readonly store: TariffStore,
    private readonly cache: TtlCache<Readonly<ResolvedPrice>>
  ) {}

  async resolve(
    venue: Venue,
    court_id: string | null,
    date: string,
    start_time: string,
    end_time: string
  ): Promise<Readonly<ResolvedPrice>> {
    const key = `${venue.venue_id}:${court_id ?? "venue"}:${date}:${start_time}:${end_time}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const lookup = this.lookup(venue, court_id, date, start_time, end_time)
      .then((price) => {
        this.cache.set(key, price);
        return price;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, lookup);
    return lookup;
  }

  private async lookup(
    venue: Venue,
    court_id: string | null,
    date: string,
    start_time: string,
    end_time: string
  ): Promise<Readonly<ResolvedPrice>> {
    const normalized = normalizeSlot(venue.timezone, date, start_time, end_time);
    if (!normalized.ok) {
      throw new BookingError(
        normalized.error === "InvalidTimeZone" ? "InvalidTimeZone" : "ValidationFailed",
        normalized.message,
        { venue_id: venue.venue_id, timezone: venue.timezone }
      );
    }
    const { weekday } = normalized.slot;

    const candidates = await this.store.listApplicable({
      venue_id: venue.venue_id,
      court_id,
      weekday,
      start_time,
      end_time,
    });
    const price = pickTariff(candidates, court_id);
    if (!price) {
      throw new BookingError("NoApplicableTariff", "No tariff covers the requested interval", {
        venue_id: venue.venue_id,
        court_id,
        weekday,
        date,
        start_time,
        end_time,
      });
    }
    return Object.freeze(price);
  }
}
