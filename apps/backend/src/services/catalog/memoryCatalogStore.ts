import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  CourtSchema,
  TariffSchema,
  VenueSchema,
  type Court,
  type Tariff,
  type Venue,
} from "@courtbook/shared-schemas";
import type { Catalog } from "./catalog.js";
import type { TariffQuery, TariffStore } from "../tariffs/tariffResolver.js";

export const CatalogSeedSchema = z.object({
  venues: z.array(VenueSchema),
  courts: z.array(CourtSchema),
  tariffs: z.array(TariffSchema),
});

export type CatalogSeed = z.input<typeof CatalogSeedSchema>;

export class MemoryCatalogStore implements Catalog, TariffStore {
  private readonly venues = new Map<string, Venue>();
  private readonly courts = new Map<string, Court>();
  private readonly tariffs: Tariff[];

  constructor(seed: CatalogSeed) {
    const parsed = CatalogSeedSchema.parse(seed);
    for (const venue of parsed.venues) this.venues.set(venue.venue_id, venue);
    for (const court of parsed.courts) this.courts.set(court.court_id, court);
    this.tariffs = parsed.tariffs;
  }

  static async fromFile(path: string): Promise<MemoryCatalogStore> {
    const raw: unknown = JSON.parse(await readFile(path, "utf8"));
    return new MemoryCatalogStore(CatalogSeedSchema.parse(raw));
  }

  async getVenue(venue_id: string): Promise<Venue | null> {
    return this.venues.get(venue_id) ?? null;
  }

  async getCourt(court_id: string): Promise<Court | null> {
    return this.courts.get(court_id) ?? null;
  }

  async listApplicable(query: TariffQuery): Promise<Tariff[]> {
    return this.tariffs.filter(
      (t) =>
        t.venue_id === query.venue_id &&
        (t.court_id === null || t.court_id === query.court_id) &&
        t.weekday === query.weekday &&
        t.start_time <= query.start_time &&
        t.end_time >= query.end_time
    );
  }
}
