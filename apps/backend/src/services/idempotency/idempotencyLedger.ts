import type { z } from "zod";
import type { Clock } from "../clock.js";
import type { BookingStore, BookingUnitOfWork, IdempotencyScope } from "../reservations/ports.js";

export type Produced<T> = {
  reservation_id: string;
  response: T;
  /** False when the operation found nothing to do. */
  changed?: boolean;
};

export type LedgerOutcome<T> = {
  response: T;
  replayed: boolean;
  changed: boolean;
};

/**
 * Records the first result of each (operation, key, identity) and replays it.
 * The claim, the work and the record share one transaction, so a failure
 * leaves the key free for a retry.
 */
export class IdempotencyLedger {
  constructor(
    private readonly store: BookingStore,
    private readonly clock: Clock
  ) {}

  async getOrCreate<T>(
    scope: IdempotencyScope | null,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    produce: (uow: BookingUnitOfWork) => Promise<Produced<T>>
  ): Promise<LedgerOutcome<T>> {
    return this.store.transaction(async (uow) => {
      if (scope) {
        const existing = await uow.idempotency.claim(scope, this.clock());
        if (existing) {
          return { response: schema.parse(existing.response), replayed: true, changed: false };
        }
      }

      const produced = await produce(uow);
      const response = schema.parse(produced.response);
      if (scope) {
        await uow.idempotency.complete(scope, {
          reservation_id: produced.reservation_id,
          response,
        });
      }
      return { response, replayed: false, changed: produced.changed ?? true };
    });
  }
}
