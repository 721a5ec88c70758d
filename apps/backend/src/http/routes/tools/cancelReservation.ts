import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { CancelReservationRequestSchema, CancelReservationResponseSchema } from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { READ_ONLY_RESPONSE, invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "reservations" | "apiKey" | "readOnly">;

export function registerCancelReservation(
  app: FastifyInstance,
  { reservations, apiKey, readOnly }: Deps
) {
  app.post(
    "/v1/tools/cancel-reservation",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;
      if (readOnly) {
        reply.code(403).send(READ_ONLY_RESPONSE);
        return;
      }

      const parsed = CancelReservationRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      const outcome = await reservations.cancel(parsed.data, actor);
      reply.send(CancelReservationResponseSchema.parse(outcome.response));
    }
  );
}
