/** Half-open range of minutes since local midnight. */
export type MinuteInterval = { start: number; end: number };

export function intersects(a: MinuteInterval, b: MinuteInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function widen(interval: MinuteInterval, bufferMinutes: number): MinuteInterval {
  return { start: interval.start - bufferMinutes, end: interval.end + bufferMinutes };
}
