import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ResolvePriceRequestSchema, ResolvePriceResponseSchema } from "@courtbook/shared-schemas";
import { authenticate } from "../../auth.js";
import { invalidRequest } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "quotes" | "apiKey">;

export function registerResolvePrice(app: FastifyInstance, { quotes, apiKey }: Deps) {
  app.post(
    "/v1/tools/resolve-price",
    async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const actor = authenticate(req, reply, apiKey);
      if (!actor) return;

      const parsed = ResolvePriceRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400).send(invalidRequest(parsed.error));
        return;
      }

      reply.send(ResolvePriceResponseSchema.parse(await quotes.quote(parsed.data, actor)));
    }
  );
}
