import type { Court, Venue } from "@courtbook/shared-schemas";
import { BookingError } from "../../domain/errors.js";

/** Read-only view of venues and courts. */
export interface Catalog {
  getVenue(venue_id: string): Promise<Venue | null>;
  getCourt(court_id: string): Promise<Court | null>;
}

export async function requireVenue(catalog: Catalog, venue_id: string): Promise<Venue> {
  const venue = await catalog.getVenue(venue_id);
  if (!venue) throw new BookingError("NotFound", "Venue not found", { venue_id });
  return venue;
}

export async function requireVenueCourt(
  catalog: Catalog,
  venue_id: string,
  court_id: string
): Promise<{ venue: Venue; court: Court }> {
  const venue = await requireVenue(catalog, venue_id);
  const court = await catalog.getCourt(court_id);
  if (!court) throw new BookingError("NotFound", "Court not found", { court_id });
  if (court.venue_id !== venue.venue_id) {
    throw new BookingError("ValidationFailed", "Court does not belong to venue", {
      venue_id,
      court_id,
    });
  }
  return { venue, court };
}
