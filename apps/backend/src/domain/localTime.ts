import type { Weekday } from "@courtbook/shared-schemas";

const WEEKDAYS_FROM_SUNDAY: readonly Weekday[] = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

export type NormalizedSlot = {
  timezone: string;
  date: string;
  weekday: Weekday;
  start_minutes: number;
  end_minutes: number;
  starts_at: Date;
  ends_at: Date;
};

export type NormalizeFault = "InvalidTimeZone" | "InvalidInterval";

export type NormalizeResult =
  | { ok: true; slot: NormalizedSlot }
  | { ok: false; error: NormalizeFault; message: string };

export function toMinutes(hhmm: string): number {
  const [h, m] = hhmm.split(":").map(Number);
  return h * 60 + m;
}

export function fromMinutes(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

export function weekdayOf(date: string): Weekday {
  const [y, m, d] = date.split("-").map(Number);
  return WEEKDAYS_FROM_SUNDAY[new Date(Date.UTC(y, m - 1, d)).getUTCDay()];
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat | null {
  const cached = formatters.get(timezone);
  if (cached) return cached;
  try {
    const formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timezone, formatter);
    return formatter;
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
}

export function isResolvableTimeZone(timezone: string): boolean {
  return formatterFor(timezone) !== null;
}

// Milliseconds the zone's wall clock is ahead of UTC at the given instant.
function zoneOffsetMs(formatter: Intl.DateTimeFormat, instant: number): number {
  const parts = formatter.formatToParts(new Date(instant));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((p) => p.type === type)?.value ?? "0");
  const wallAsUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour") % 24,
    part("minute"),
    part("second")
  );
  return wallAsUtc - (instant - (instant % 1000));
}

function wallClockToInstant(formatter: Intl.DateTimeFormat, date: string, minutes: number): Date {
  const [y, m, d] = date.split("-").map(Number);
  const wall = Date.UTC(y, m - 1, d, Math.floor(minutes / 60), minutes % 60);
  const firstGuess = wall - zoneOffsetMs(formatter, wall);
  // A second pass settles instants that sit on the far side of a DST change.
  const settled = wall - zoneOffsetMs(formatter, firstGuess);
  return new Date(settled);
}

/**
 * Places a naive local date and time range in the venue's zone.
 * Returns a fault value rather than throwing so callers pick the error surface.
 */
export function normalizeSlot(
  timezone: string,
  date: string,
  start_time: string,
  end_time: string
): NormalizeResult {
  const formatter = formatterFor(timezone);
  if (!formatter) {
    return { ok: false, error: "InvalidTimeZone", message: `Unknown time zone: ${timezone}` };
  }
  const start_minutes = toMinutes(start_time);
  const end_minutes = toMinutes(end_time);
  if (end_minutes <= start_minutes) {
    return {
      ok: false,
      error: "InvalidInterval",
      message: "end_time must be later than start_time",
    };
  }
  return {
    ok: true,
    slot: {
      timezone,
      date,
      weekday: weekdayOf(date),
      start_minutes,
      end_minutes,
      starts_at: wallClockToInstant(formatter, date, start_minutes),
      ends_at: wallClockToInstant(formatter, date, end_minutes),
    },
  };
}
