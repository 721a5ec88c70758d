import type { SweepExpiredHoldsResponse } from "@courtbook/shared-schemas";
import type { Logger } from "../../observability/logger.js";
import { recordSafely, type AuditSink } from "../audit/auditSink.js";
import type { Clock } from "../clock.js";
import type { BookingStore } from "./ports.js";

export type HoldSweeperDeps = {
  store: BookingStore;
  audit: AuditSink;
  clock: Clock;
  logger: Logger;
  intervalMs: number;
};

export const SYSTEM_ACTOR_ID = "system-hold-sweeper";

export class HoldSweeper {
  private intervalId: NodeJS.Timeout | null = null;

  constructor(private readonly deps: HoldSweeperDeps) {}

  /** One conditional update; rows that already left `hold` are untouched. */
  async sweep(): Promise<SweepExpiredHoldsResponse> {
    const { store, audit, clock, logger } = this.deps;
    const now = clock();
    const expired = await store.transaction(async (uow) => {
      const rows = await uow.reservations.expireHolds(now);
      for (const reservation of rows) {
        await uow.history.append({
          reservation_id: reservation.reservation_id,
          from_state: "hold",
          to_state: "expired",
          actor_id: SYSTEM_ACTOR_ID,
          at: now.toISOString(),
          note: null,
        });
      }
      return rows;
    });

    for (const reservation of expired) {
      await recordSafely(audit, logger, {
        action: "expire_hold",
        outcome: "success",
        actor_id: SYSTEM_ACTOR_ID,
        reservation_id: reservation.reservation_id,
        at: now.toISOString(),
      });
    }

    if (expired.length > 0) {
      logger.info({ expired: expired.length }, "[Hold Sweeper] expired stale holds");
    } else {
      logger.debug("[Hold Sweeper] no stale holds");
    }

    return {
      expired: expired.length,
      reservation_ids: expired.map((r) => r.reservation_id),
      ran_at: now.toISOString(),
    };
  }

  start(): void {
    if (this.intervalId) {
      this.deps.logger.info("[Hold Sweeper] already running");
      return;
    }
    this.intervalId = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        this.deps.logger.error({ err }, "[Hold Sweeper] sweep failed");
      });
    }, this.deps.intervalMs);
    this.intervalId.unref();
    this.deps.logger.info({ intervalMs: this.deps.intervalMs }, "[Hold Sweeper] started");
  }

  stop(): void {
    if (!this.intervalId) return;
    clearInterval(this.intervalId);
    this.intervalId = null;
    this.deps.logger.info("[Hold Sweeper] stopped");
  }

  get running(): boolean {
    return this.intervalId !== null;
  }
}
