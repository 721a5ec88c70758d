import type pg from "pg";
import {
  ReservationHistoryEntrySchema,
  ReservationSchema,
  type Reservation,
  type ReservationHistoryEntry,
  type ReservationState,
} from "@courtbook/shared-schemas";
import { withTransaction } from "../../db/tx.js";
import type {
  BookingStore,
  BookingUnitOfWork,
  HistoryRepository,
  IdempotencyRecord,
  IdempotencyRepository,
  IdempotencyScope,
  ReservationRepository,
} from "./ports.js";

type Sql = <R extends pg.QueryResultRow>(
  text: string,
  values: unknown[]
) => Promise<pg.QueryResult<R>>;

type ReservationRow = {
  reservation_id: string;
  venue_id: string;
  court_id: string;
  requested_by: string;
  date: string;
  start_time: string;
  end_time: string;
  state: string;
  price: unknown;
  idempotency_hold: string;
  idempotency_confirm: string | null;
  idempotency_cancel: string | null;
  hold_expires_at: Date | null;
  confirmed_at: Date | null;
  cancelled_at: Date | null;
  cancellation_reason: string | null;
  refund: unknown;
  expired_at: Date | null;
  rescheduled_at: Date | null;
  rescheduled_to: string | null;
  rescheduled_from: string | null;
  created_at: Date;
  updated_at: Date;
};

type HistoryRow = {
  reservation_id: string;
  from_state: string | null;
  to_state: string;
  actor_id: string;
  at: Date;
  note: string | null;
};

type IdempotencyRow = {
  operation: string;
  idempotency_key: string;
  identity: string;
  reservation_id: string | null;
  response: unknown;
  created_at: Date;
};

const RESERVATION_COLUMNS = `
  reservation_id, venue_id, court_id, requested_by,
  to_char(date, 'YYYY-MM-DD') AS date,
  to_char(start_time, 'HH24:MI') AS start_time,
  to_char(end_time, 'HH24:MI') AS end_time,
  state, price, idempotency_hold, idempotency_confirm, idempotency_cancel,
  hold_expires_at, confirmed_at, cancelled_at, cancellation_reason, refund, expired_at,
  rescheduled_at, rescheduled_to, rescheduled_from, created_at, updated_at
`;

const iso = (d: Date | null) => (d ? d.toISOString() : undefined);

function rowToReservation(row: ReservationRow): Reservation {
  // Columns of other states are stripped by the variant schema.
  return ReservationSchema.parse({
    reservation_id: row.reservation_id,
    venue_id: row.venue_id,
    court_id: row.court_id,
    requested_by: row.requested_by,
    date: row.date,
    start_time: row.start_time,
    end_time: row.end_time,
    state: row.state,
    price: row.price,
    idempotency_keys: {
      hold: row.idempotency_hold,
      confirm: row.idempotency_confirm,
      cancel: row.idempotency_cancel,
    },
    hold_expires_at: iso(row.hold_expires_at),
    confirmed_at: iso(row.confirmed_at),
    cancelled_at: iso(row.cancelled_at),
    cancellation_reason: row.cancellation_reason ?? undefined,
    refund: row.refund ?? undefined,
    expired_at: iso(row.expired_at),
    rescheduled_at: iso(row.rescheduled_at),
    rescheduled_to: row.rescheduled_to ?? undefined,
    rescheduled_from: row.rescheduled_from ?? undefined,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  });
}

function stateColumns(r: Reservation) {
  return {
    hold_expires_at: r.state === "hold" ? r.hold_expires_at : null,
    confirmed_at: r.state === "confirmed" ? r.confirmed_at : null,
    cancelled_at: r.state === "cancelled" ? r.cancelled_at : null,
    cancellation_reason: r.state === "cancelled" ? r.cancellation_reason : null,
    refund: r.state === "cancelled" ? JSON.stringify(r.refund) : null,
    expired_at: r.state === "expired" ? r.expired_at : null,
    rescheduled_at: r.state === "rescheduled" ? r.rescheduled_at : null,
    rescheduled_to: r.state === "rescheduled" ? r.rescheduled_to : null,
  };
}

class PgReservationRepository implements ReservationRepository {
  constructor(private readonly sql: Sql) {}

  async findById(
    reservation_id: string,
    opts: { forUpdate?: boolean } = {}
  ): Promise<Reservation | null> {
    const { rows } = await this.sql<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS}
       FROM reservations
       WHERE reservation_id = $1
       ${opts.forUpdate ? "FOR UPDATE" : ""}`,
      [reservation_id]
    );
    const row = rows[0];
    return row ? rowToReservation(row) : null;
  }

  async listActiveForCourt(court_id: string, date: string): Promise<Reservation[]> {
    const { rows } = await this.sql<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS}
       FROM reservations
       WHERE court_id = $1
         AND date = $2::date
         AND state IN ('hold', 'pending', 'confirmed')
       ORDER BY start_time`,
      [court_id, date]
    );
    return rows.map(rowToReservation);
  }

  async insert(r: Reservation): Promise<void> {
    const cols = stateColumns(r);
    await this.sql(
      `INSERT INTO reservations
       (reservation_id, venue_id, court_id, requested_by, date, start_time, end_time, state, price,
        idempotency_hold, idempotency_confirm, idempotency_cancel,
        hold_expires_at, confirmed_at, cancelled_at, cancellation_reason, refund, expired_at,
        rescheduled_at, rescheduled_to, rescheduled_from, created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5::date,$6::time,$7::time,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,
               $19,$20,$21,$22,$23)`,
      [
        r.reservation_id,
        r.venue_id,
        r.court_id,
        r.requested_by,
        r.date,
        r.start_time,
        r.end_time,
        r.state,
        JSON.stringify(r.price),
        r.idempotency_keys.hold,
        r.idempotency_keys.confirm,
        r.idempotency_keys.cancel,
        cols.hold_expires_at,
        cols.confirmed_at,
        cols.cancelled_at,
        cols.cancellation_reason,
        cols.refund,
        cols.expired_at,
        cols.rescheduled_at,
        cols.rescheduled_to,
        r.rescheduled_from ?? null,
        r.created_at,
        r.updated_at,
      ]
    );
  }

  async transition(next: Reservation, expected: ReservationState): Promise<boolean> {
    const cols = stateColumns(next);
    // Earlier state timestamps stay on the row for history.
    const result = await this.sql(
      `UPDATE reservations
       SET state = $2,
           updated_at = $3,
           idempotency_confirm = $4,
           idempotency_cancel = $5,
           confirmed_at = COALESCE($6, confirmed_at),
           cancelled_at = COALESCE($7, cancelled_at),
           cancellation_reason = COALESCE($8, cancellation_reason),
           refund = COALESCE($9::jsonb, refund),
           expired_at = COALESCE($10, expired_at),
           rescheduled_at = COALESCE($12, rescheduled_at),
           rescheduled_to = COALESCE($13, rescheduled_to)
       WHERE reservation_id = $1 AND state = $11`,
      [
        next.reservation_id,
        next.state,
        next.updated_at,
        next.idempotency_keys.confirm,
        next.idempotency_keys.cancel,
        cols.confirmed_at,
        cols.cancelled_at,
        cols.cancellation_reason,
        cols.refund,
        cols.expired_at,
        expected,
        cols.rescheduled_at,
        cols.rescheduled_to,
      ]
    );
    return result.rowCount === 1;
  }

  async expireHolds(now: Date): Promise<Reservation[]> {
    const { rows } = await this.sql<ReservationRow>(
      `UPDATE reservations
       SET state = 'expired', expired_at = $1, updated_at = $1
       WHERE state = 'hold' AND hold_expires_at <= $1
       RETURNING ${RESERVATION_COLUMNS}`,
      [now.toISOString()]
    );
    return rows.map(rowToReservation);
  }
}

class PgIdempotencyRepository implements IdempotencyRepository {
  constructor(private readonly sql: Sql) {}

  async claim(scope: IdempotencyScope, now: Date): Promise<IdempotencyRecord | null> {
    // Blocks on the primary key while another transaction holds the same scope.
    const inserted = await this.sql(
      `INSERT INTO idempotency_records (operation, idempotency_key, identity, created_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT DO NOTHING`,
      [scope.operation, scope.idempotency_key, scope.identity, now.toISOString()]
    );
    if (inserted.rowCount === 1) return null;

    const { rows } = await this.sql<IdempotencyRow>(
      `SELECT operation, idempotency_key, identity, reservation_id, response, created_at
       FROM idempotency_records
       WHERE operation = $1 AND idempotency_key = $2 AND identity = $3`,
      [scope.operation, scope.idempotency_key, scope.identity]
    );
    const row = rows[0];
    if (!row) throw new Error("Idempotency record vanished after conflict");
    return {
      ...scope,
      reservation_id: row.reservation_id,
      response: row.response,
      created_at: row.created_at.toISOString(),
    };
  }

  async complete(
    scope: IdempotencyScope,
    result: { reservation_id: string; response: unknown }
  ): Promise<void> {
    await this.sql(
      `UPDATE idempotency_records
       SET reservation_id = $4, response = $5
       WHERE operation = $1 AND idempotency_key = $2 AND identity = $3`,
      [
        scope.operation,
        scope.idempotency_key,
        scope.identity,
        result.reservation_id,
        JSON.stringify(result.response),
      ]
    );
  }
}

class PgHistoryRepository implements HistoryRepository {
  constructor(private readonly sql: Sql) {}

  async append(entry: ReservationHistoryEntry): Promise<void> {
    await this.sql(
      `INSERT INTO reservation_history (reservation_id, from_state, to_state, actor_id, at, note)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [entry.reservation_id, entry.from_state, entry.to_state, entry.actor_id, entry.at, entry.note]
    );
  }

  async listFor(reservation_id: string): Promise<ReservationHistoryEntry[]> {
    const { rows } = await this.sql<HistoryRow>(
      `SELECT reservation_id, from_state, to_state, actor_id, at, note
       FROM reservation_history
       WHERE reservation_id = $1
       ORDER BY at DESC, history_id DESC`,
      [reservation_id]
    );
    return rows.map((row) =>
      ReservationHistoryEntrySchema.parse({ ...row, at: row.at.toISOString() })
    );
  }
}

export class PgBookingStore implements BookingStore {
  readonly reservations: ReservationRepository;
  readonly history: HistoryRepository;

  constructor(private readonly pool: pg.Pool) {
    const sql: Sql = <R extends pg.QueryResultRow>(text: string, values: unknown[]) =>
      this.pool.query<R>(text, values);
    this.reservations = new PgReservationRepository(sql);
    this.history = new PgHistoryRepository(sql);
  }

  async transaction<T>(fn: (uow: BookingUnitOfWork) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, async (client) => {
      const sql: Sql = <R extends pg.QueryResultRow>(text: string, values: unknown[]) =>
        client.query<R>(text, values);
      return fn({
        reservations: new PgReservationRepository(sql),
        idempotency: new PgIdempotencyRepository(sql),
        history: new PgHistoryRepository(sql),
        lockCourt: async (court_id) => {
          await sql(`SELECT pg_advisory_xact_lock(hashtext($1))`, [`court:${court_id}`]);
        },
      });
    });
  }
}
