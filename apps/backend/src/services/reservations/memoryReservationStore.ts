import {
  ACTIVE_RESERVATION_STATES,
  type Reservation,
  type ReservationHistoryEntry,
  type ReservationState,
} from "@courtbook/shared-schemas";
import { toExpired } from "../../domain/reservationStateMachine.js";
import type {
  BookingStore,
  BookingUnitOfWork,
  HistoryRepository,
  IdempotencyRecord,
  IdempotencyRepository,
  IdempotencyScope,
  ReservationRepository,
} from "./ports.js";

type Release = () => void;

/** FIFO lock per key. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Release = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

const scopeKey = (s: IdempotencyScope) => `${s.operation}\u0000${s.idempotency_key}\u0000${s.identity}`;

const isActive = (state: ReservationState) =>
  ACTIVE_RESERVATION_STATES.some((active) => active === state);

type Tx = {
  lock(key: string): Promise<void>;
  onRollback(undo: () => void): void;
};

// Outside a transaction every write is its own unit.
const AUTOCOMMIT: Tx = {
  lock: async () => undefined,
  onRollback: () => undefined,
};

class MemoryReservationRepository implements ReservationRepository {
  constructor(
    private readonly rows: Map<string, Reservation>,
    private readonly tx: Tx
  ) {}

  async findById(
    reservation_id: string,
    opts: { forUpdate?: boolean } = {}
  ): Promise<Reservation | null> {
    if (opts.forUpdate) await this.tx.lock(`reservation:${reservation_id}`);
    return this.rows.get(reservation_id) ?? null;
  }

  async listActiveForCourt(court_id: string, date: string): Promise<Reservation[]> {
    return [...this.rows.values()]
      .filter((r) => r.court_id === court_id && r.date === date && isActive(r.state))
      .sort((a, b) => a.start_time.localeCompare(b.start_time));
  }

  async insert(reservation: Reservation): Promise<void> {
    const { reservation_id } = reservation;
    if (this.rows.has(reservation_id)) {
      throw new Error(`Duplicate reservation_id ${reservation_id}`);
    }
    this.rows.set(reservation_id, reservation);
    this.tx.onRollback(() => this.rows.delete(reservation_id));
  }

  async transition(next: Reservation, expected: ReservationState): Promise<boolean> {
    const current = this.rows.get(next.reservation_id);
    if (!current || current.state !== expected) return false;
    this.rows.set(next.reservation_id, next);
    this.tx.onRollback(() => this.rows.set(current.reservation_id, current));
    return true;
  }

  async expireHolds(now: Date): Promise<Reservation[]> {
    const expired: Reservation[] = [];
    for (const current of this.rows.values()) {
      if (current.state !== "hold" || Date.parse(current.hold_expires_at) > now.getTime()) continue;
      const next = toExpired(current, now);
      this.rows.set(current.reservation_id, next);
      this.tx.onRollback(() => this.rows.set(current.reservation_id, current));
      expired.push(next);
    }
    return expired;
  }
}

class MemoryIdempotencyRepository implements IdempotencyRepository {
  private readonly claimedAt = new Map<string, string>();

  constructor(
    private readonly records: Map<string, IdempotencyRecord>,
    private readonly tx: Tx
  ) {}

  async claim(scope: IdempotencyScope, now: Date): Promise<IdempotencyRecord | null> {
    // Held until the transaction ends, so a second claimer sees the first result.
    await this.tx.lock(`idempotency:${scopeKey(scope)}`);
    const existing = this.records.get(scopeKey(scope));
    if (existing) return existing;
    this.claimedAt.set(scopeKey(scope), now.toISOString());
    return null;
  }

  async complete(
    scope: IdempotencyScope,
    result: { reservation_id: string; response: unknown }
  ): Promise<void> {
    const key = scopeKey(scope);
    this.records.set(key, {
      ...scope,
      reservation_id: result.reservation_id,
      response: result.response,
      created_at: this.claimedAt.get(key) ?? new Date().toISOString(),
    });
    this.tx.onRollback(() => this.records.delete(key));
  }
}

class MemoryHistoryRepository implements HistoryRepository {
  constructor(
    private readonly entries: ReservationHistoryEntry[],
    private readonly tx: Tx
  ) {}

  async append(entry: ReservationHistoryEntry): Promise<void> {
    this.entries.push(entry);
    this.tx.onRollback(() => {
      const at = this.entries.lastIndexOf(entry);
      if (at >= 0) this.entries.splice(at, 1);
    });
  }

  async listFor(reservation_id: string): Promise<ReservationHistoryEntry[]> {
    return this.entries.filter((e) => e.reservation_id === reservation_id).reverse();
  }
}

export class MemoryBookingStore implements BookingStore {
  private readonly rows = new Map<string, Reservation>();
  private readonly records = new Map<string, IdempotencyRecord>();
  private readonly entries: ReservationHistoryEntry[] = [];
  private readonly mutex = new KeyedMutex();
  readonly reservations: ReservationRepository = new MemoryReservationRepository(
    this.rows,
    AUTOCOMMIT
  );
  readonly history: HistoryRepository = new MemoryHistoryRepository(this.entries, AUTOCOMMIT);

  async transaction<T>(fn: (uow: BookingUnitOfWork) => Promise<T>): Promise<T> {
    const held = new Set<string>();
    const releases: Release[] = [];
    const undo: Array<() => void> = [];
    const tx: Tx = {
      lock: async (key) => {
        if (held.has(key)) return;
        held.add(key);
        releases.push(await this.mutex.acquire(key));
      },
      onRollback: (fn) => {
        undo.push(fn);
      },
    };

    try {
      return await fn({
        reservations: new MemoryReservationRepository(this.rows, tx),
        idempotency: new MemoryIdempotencyRepository(this.records, tx),
        history: new MemoryHistoryRepository(this.entries, tx),
        lockCourt: (court_id) => tx.lock(`court:${court_id}`),
      });
    } catch (err) {
      for (const revert of undo.reverse()) revert();
      throw err;
    } finally {
      for (const release of releases) release();
    }
  }

  /** Number of recorded idempotency results. */
  get recordCount(): number {
    return this.records.size;
  }
}
