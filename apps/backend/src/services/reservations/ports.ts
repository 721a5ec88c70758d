import type {
  Reservation,
  ReservationHistoryEntry,
  ReservationState,
} from "@courtbook/shared-schemas";

export type IdempotencyOperation = "create_hold" | "confirm" | "cancel" | "reschedule";

export type IdempotencyScope = {
  operation: IdempotencyOperation;
  idempotency_key: string;
  identity: string;
};

export type IdempotencyRecord = IdempotencyScope & {
  reservation_id: string | null;
  response: unknown;
  created_at: string;
};

export interface IdempotencyRepository {
  /**
   * Insert-if-absent. Resolves to null when this caller now owns the scope,
   * or to the record another caller already completed.
   */
  claim(scope: IdempotencyScope, now: Date): Promise<IdempotencyRecord | null>;
  complete(
    scope: IdempotencyScope,
    result: { reservation_id: string; response: unknown }
  ): Promise<void>;
}

export interface ReservationRepository {
  findById(reservation_id: string, opts?: { forUpdate?: boolean }): Promise<Reservation | null>;
  /** Hold, pending and confirmed rows; expiry is left to the caller. */
  listActiveForCourt(court_id: string, date: string): Promise<Reservation[]>;
  insert(reservation: Reservation): Promise<void>;
  /** Compare-and-set on state. False when the row had already moved on. */
  transition(next: Reservation, expected: ReservationState): Promise<boolean>;
  expireHolds(now: Date): Promise<Reservation[]>;
}

export interface HistoryRepository {
  append(entry: ReservationHistoryEntry): Promise<void>;
  /** Newest first. */
  listFor(reservation_id: string): Promise<ReservationHistoryEntry[]>;
}

export interface BookingUnitOfWork {
  reservations: ReservationRepository;
  idempotency: IdempotencyRepository;
  history: HistoryRepository;
  /** Exclusive until the unit of work ends. */
  lockCourt(court_id: string): Promise<void>;
}

export interface BookingStore {
  transaction<T>(fn: (uow: BookingUnitOfWork) => Promise<T>): Promise<T>;
  /** Non-transactional access for reads and single-statement writes. */
  reservations: ReservationRepository;
  history: HistoryRepository;
}
