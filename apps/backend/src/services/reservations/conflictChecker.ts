import type { Reservation } from "@courtbook/shared-schemas";
import { intersects, widen } from "../../domain/interval.js";
import { toMinutes } from "../../domain/localTime.js";
import { blocksSlot } from "../../domain/reservationStateMachine.js";
import type { Clock } from "../clock.js";
import type { ReservationRepository } from "./ports.js";

export type SlotCandidate = {
  court_id: string;
  date: string;
  start_time: string;
  end_time: string;
  buffer_minutes: number;
  exclude_reservation_id?: string;
};

export function conflictsWith(existing: Reservation, candidate: SlotCandidate, now: Date): boolean {
  if (existing.reservation_id === candidate.exclude_reservation_id) return false;
  if (existing.court_id !== candidate.court_id || existing.date !== candidate.date) return false;
  if (!blocksSlot(existing, now)) return false;
  const occupied = widen(
    { start: toMinutes(existing.start_time), end: toMinutes(existing.end_time) },
    candidate.buffer_minutes
  );
  return intersects(occupied, {
    start: toMinutes(candidate.start_time),
    end: toMinutes(candidate.end_time),
  });
}

/** Must run inside the transaction and court lock of the write it guards. */
export class ConflictChecker {
  constructor(private readonly clock: Clock) {}

  async findConflicts(repo: ReservationRepository, candidate: SlotCandidate): Promise<Reservation[]> {
    const now = this.clock();
    const existing = await repo.listActiveForCourt(candidate.court_id, candidate.date);
    return existing.filter((r) => conflictsWith(r, candidate, now));
  }

  async hasConflict(repo: ReservationRepository, candidate: SlotCandidate): Promise<boolean> {
    return (await this.findConflicts(repo, candidate)).length > 0;
  }
}
