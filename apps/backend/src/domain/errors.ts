import type { BookingErrorKind, ErrorResponse } from "@courtbook/shared-schemas";

const HTTP_STATUS: Record<BookingErrorKind, number> = {
  NoApplicableTariff: 404,
  InvalidTimeZone: 500,
  OutsideOpeningHours: 422,
  CourtNotReservable: 409,
  OverlappingReservation: 409,
  InvalidState: 409,
  NotFound: 404,
  Forbidden: 403,
  ValidationFailed: 400,
};

export class BookingError extends Error {
  readonly kind: BookingErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: BookingErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "BookingError";
    this.kind = kind;
    this.details = details;
  }

  get http(): number {
    return HTTP_STATUS[this.kind];
  }

  /** Configuration defects are server faults, not caller mistakes. */
  get isFault(): boolean {
    return this.http >= 500;
  }

  toResponse(): ErrorResponse {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
      },
    };
  }
}

export function isBookingError(err: unknown): err is BookingError {
  return err instanceof BookingError;
}
