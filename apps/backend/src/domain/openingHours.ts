import type { Court, OpeningHours, Venue, Weekday } from "@courtbook/shared-schemas";
import type { MinuteInterval } from "./interval.js";
import { toMinutes } from "./localTime.js";

export function effectiveOpeningHours(venue: Venue, court: Court): OpeningHours {
  return court.opening_hours ?? venue.opening_hours;
}

export function openingRanges(hours: OpeningHours, weekday: Weekday): MinuteInterval[] {
  return (hours[weekday] ?? []).map((range) => {
    const [start, end] = range.split("-");
    return { start: toMinutes(start), end: toMinutes(end) };
  });
}

/** True when a single opening range contains the whole interval. */
export function coversInterval(ranges: MinuteInterval[], interval: MinuteInterval): boolean {
  return ranges.some((r) => interval.start >= r.start && interval.end <= r.end);
}
