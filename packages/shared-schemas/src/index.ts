// packages/shared-schemas/src/index.ts
export * from './domain/date.js';
export * from './domain/money.js';
export * from './domain/venue.js';
export * from './domain/tariff.js';
export * from './domain/reservation.js';
export * from './domain/actor.js';
export * from './domain/errors.js';
export * from './domain/history.js';

export * from './tools/resolvePrice.js';
export * from './tools/createHold.js';
export * from './tools/confirmReservation.js';
export * from './tools/cancelReservation.js';
export * from './tools/rescheduleReservation.js';
export * from './tools/getReservationDetails.js';
export * from './tools/checkAvailability.js';
export * from './tools/sweepExpiredHolds.js';
