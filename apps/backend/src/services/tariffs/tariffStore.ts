import type pg from "pg";
import { TariffSchema, type Tariff } from "@courtbook/shared-schemas";
import type { TariffQuery, TariffStore } from "./tariffResolver.js";

type TariffRow = {
  tariff_id: string;
  scope: string;
  venue_id: string;
  court_id: string | null;
  weekday: string;
  start_time: string;
  end_time: string;
  currency: string;
  price_per_block: number;
  created_at: Date;
};

export class PgTariffStore implements TariffStore {
  constructor(private readonly pool: pg.Pool) {}

  async listApplicable(query: TariffQuery): Promise<Tariff[]> {
    // Both scopes in one round trip; the resolver applies precedence.
    const sql = `
      SELECT tariff_id, scope, venue_id, court_id, weekday,
             to_char(start_time, 'HH24:MI') AS start_time,
             to_char(end_time, 'HH24:MI') AS end_time,
             currency, price_per_block, created_at
      FROM tariffs
      WHERE venue_id = $1
        AND (court_id IS NULL OR court_id = $2)
        AND weekday = $3
        AND start_time <= $4::time
        AND end_time >= $5::time
        AND active = TRUE
      ORDER BY created_at DESC
    `;
    const { rows } = await this.pool.query<TariffRow>(sql, [
      query.venue_id,
      query.court_id,
      query.weekday,
      query.start_time,
      query.end_time,
    ]);
    return rows.map((row) =>
      TariffSchema.parse({ ...row, created_at: row.created_at.toISOString() })
    );
  }
}
