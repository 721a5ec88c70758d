import type {
  AvailabilitySlot,
  CheckAvailabilityRequest,
  CheckAvailabilityResponse,
} from "@courtbook/shared-schemas";
import { BookingError } from "../../domain/errors.js";
import { fromMinutes, isResolvableTimeZone, weekdayOf } from "../../domain/localTime.js";
import { effectiveOpeningHours, openingRanges } from "../../domain/openingHours.js";
import { requireVenueCourt, type Catalog } from "../catalog/catalog.js";
import type { Clock } from "../clock.js";
import { conflictsWith } from "../reservations/conflictChecker.js";
import type { BookingStore } from "../reservations/ports.js";

export type AvailabilityServiceDeps = {
  catalog: Catalog;
  store: BookingStore;
  clock: Clock;
};

export class AvailabilityService {
  constructor(private readonly deps: AvailabilityServiceDeps) {}

  async check(req: CheckAvailabilityRequest): Promise<CheckAvailabilityResponse> {
    const { catalog, store, clock } = this.deps;
    const { venue, court } = await requireVenueCourt(catalog, req.venue_id, req.court_id);
    if (!isResolvableTimeZone(venue.timezone)) {
      throw new BookingError("InvalidTimeZone", `Unknown time zone: ${venue.timezone}`, {
        venue_id: venue.venue_id,
        timezone: venue.timezone,
      });
    }

    const ranges = openingRanges(effectiveOpeningHours(venue, court), weekdayOf(req.date));
    const existing = ranges.length
      ? await store.reservations.listActiveForCourt(court.court_id, req.date)
      : [];
    const now = clock();

    const slots: AvailabilitySlot[] = [];
    for (const range of ranges) {
      for (let start = range.start; start + req.slot_minutes <= range.end; start += req.slot_minutes) {
        const candidate = {
          court_id: court.court_id,
          date: req.date,
          start_time: fromMinutes(start),
          end_time: fromMinutes(start + req.slot_minutes),
          buffer_minutes: venue.buffer_minutes,
        };
        slots.push({
          start_time: candidate.start_time,
          end_time: candidate.end_time,
          available: court.reservable && !existing.some((r) => conflictsWith(r, candidate, now)),
        });
      }
    }

    return {
      venue_id: venue.venue_id,
      court_id: court.court_id,
      date: req.date,
      timezone: venue.timezone,
      closed: ranges.length === 0,
      buffer_minutes: venue.buffer_minutes,
      slots,
      total_slots: slots.length,
      available_slots: slots.filter((s) => s.available).length,
    };
  }
}
