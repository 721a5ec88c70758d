import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { CheckAvailabilityRequestSchema, CheckAvailabilityResponseSchema } from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "availability" | "apiKey">;

export function registerCheckAvailability(app: FastifyInstance, { availability, apiKey }: Deps) {
  app.post(
    "/v1/tools/check-availability",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;

      const parsed = CheckAvailabilityRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      reply.send(CheckAvailabilityResponseSchema.parse(await availability.check(parsed.data)));
    }
  );
}
