import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  RescheduleReservationRequestSchema,
  RescheduleReservationResponseSchema,
} from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { READ_ONLY_RESPONSE, invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "reservations" | "apiKey" | "readOnly">;

export function registerRescheduleReservation(
  app: FastifyInstance,
  { reservations, apiKey, readOnly }: Deps
) {
  app.post(
    "/v1/tools/reschedule-reservation",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;
      if (readOnly) {
        reply.code(403).send(READ_ONLY_RESPONSE);
        return;
      }

      const parsed = RescheduleReservationRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      const outcome = await reservations.reschedule(parsed.data, actor);
      reply
        .code(outcome.replayed ? 200 : 201)
        .send(RescheduleReservationResponseSchema.parse(outcome.response));
    }
  );
}
