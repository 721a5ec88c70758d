import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { GetReservationDetailsRequestSchema, GetReservationDetailsResponseSchema } from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "reservations" | "apiKey">;

export function registerGetReservationDetails(app: FastifyInstance, { reservations, apiKey }: Deps) {
  app.post(
    "/v1/tools/get-reservation-details",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;

      const parsed = GetReservationDetailsRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      reply.send(
        GetReservationDetailsResponseSchema.parse(
          await reservations.get(parsed.data.reservation_id, actor)
        )
      );
    }
  );
}
