import type pg from "pg";
import { CourtSchema, VenueSchema, type Court, type Venue } from "@courtbook/shared-schemas";
import type { Catalog } from "./catalog.js";

type VenueRow = {
  venue_id: string;
  name: string;
  timezone: string;
  opening_hours: unknown;
  buffer_minutes: number;
};

type CourtRow = {
  court_id: string;
  venue_id: string;
  name: string;
  reservable: boolean;
  opening_hours: unknown;
};

export class PgCatalogStore implements Catalog {
  constructor(private readonly pool: pg.Pool) {}

  async getVenue(venue_id: string): Promise<Venue | null> {
    const { rows } = await this.pool.query<VenueRow>(
      `SELECT venue_id, name, timezone, opening_hours, buffer_minutes
       FROM venues
       WHERE venue_id = $1`,
      [venue_id]
    );
    const row = rows[0];
    return row ? VenueSchema.parse(row) : null;
  }

  async getCourt(court_id: string): Promise<Court | null> {
    const { rows } = await this.pool.query<CourtRow>(
      `SELECT court_id, venue_id, name, reservable, opening_hours
       FROM courts
       WHERE court_id = $1`,
      [court_id]
    );
    const row = rows[0];
    return row ? CourtSchema.parse(row) : null;
  }
}
