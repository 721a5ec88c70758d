import { isBookingError } from "../../domain/errors.js";
import type { Logger } from "../../observability/logger.js";

export type AuditAction =
  | "resolve_price"
  | "create_hold"
  | "confirm"
  | "cancel"
  | "reschedule"
  | "get_reservation"
  | "expire_hold";

export type AuditEvent = {
  action: AuditAction;
  outcome: "success" | "rejected" | "error";
  actor_id: string;
  reservation_id?: string;
  kind?: string;
  detail?: Record<string, unknown>;
  at: string;
};

export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}

export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  async record(event: AuditEvent): Promise<void> {
    const level = event.outcome === "error" ? "error" : "info";
    this.logger[level]({ audit: event }, `audit ${event.action} ${event.outcome}`);
  }
}

/** Audit failures are logged and never mask the operation's own outcome. */
export async function recordSafely(sink: AuditSink, logger: Logger, event: AuditEvent): Promise<void> {
  try {
    await sink.record(event);
  } catch (err) {
    logger.error({ err, event }, "audit sink rejected event");
  }
}

export function failureEvent(
  action: AuditAction,
  actor_id: string,
  reservation_id: string | undefined,
  err: unknown,
  at: Date
): AuditEvent {
  if (isBookingError(err)) {
    return {
      action,
      outcome: err.isFault ? "error" : "rejected",
      actor_id,
      reservation_id,
      kind: err.kind,
      detail: err.details,
      at: at.toISOString(),
    };
  }
  return { action, outcome: "error", actor_id, reservation_id, kind: "Internal", at: at.toISOString() };
}
