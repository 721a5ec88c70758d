import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import type { ZodError } from "zod";
import type { ErrorResponse } from "@courtbook/shared-schemas";
import { isBookingError } from "../domain/errors.js";

export function invalidRequest(error: ZodError, message = "Invalid request"): ErrorResponse {
  return { error: { kind: "ValidationFailed", message, details: error.flatten() } };
}

export const READ_ONLY_RESPONSE: ErrorResponse = {
  error: { kind: "Forbidden", message: "Store is in read-only mode" },
};

export function sendError(req: FastifyRequest, reply: FastifyReply, err: FastifyError | Error): void {
  if (isBookingError(err)) {
    if (err.isFault) req.log.error({ err }, err.message);
    reply.code(err.http).send(err.toResponse());
    return;
  }
  // Body parsing and content-type failures raised by Fastify itself.
  const statusCode =
    "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined;
  if (statusCode && statusCode >= 400 && statusCode < 500) {
    reply.code(statusCode).send({ error: { kind: "ValidationFailed", message: err.message } });
    return;
  }
  req.log.error({ err }, "unhandled error");
  reply.code(500).send({ error: { kind: "Internal", message: "Internal server error" } });
}
