import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { CreateHoldRequestSchema, CreateHoldResponseSchema } from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { READ_ONLY_RESPONSE, invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "reservations" | "apiKey" | "readOnly">;

export function registerCreateHold(app: FastifyInstance, { reservations, apiKey, readOnly }: Deps) {
  app.post(
    "/v1/tools/create-hold",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;
      if (readOnly) {
        reply.code(403).send(READ_ONLY_RESPONSE);
        return;
      }

      const parsed = CreateHoldRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      const outcome = await reservations.createHold(parsed.data, actor);
      reply.code(outcome.replayed ? 200 : 201).send(CreateHoldResponseSchema.parse(outcome.response));
    }
  );
}
