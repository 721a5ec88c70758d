import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { SweepExpiredHoldsResponseSchema } from "@courtbook/shared-schemas";
import { authenticate, isStaff } from "../../auth.js";
import { READ_ONLY_RESPONSE } from "../../errors.js";
import type { ToolDeps } from "./deps.js";

type Deps = Pick<ToolDeps, "sweeper" | "apiKey" | "readOnly">;

export function registerSweepExpiredHolds(app: FastifyInstance, { sweeper, apiKey, readOnly }: Deps) {
  app.post("/v1/tools/sweep-expired-holds", async (req: FastifyRequest, reply: FastifyReply) => {
    const actor = authenticate(req, reply, apiKey);
    if (!actor) return;
    if (!isStaff(actor)) {
      reply.code(403).send({ error: { kind: "Forbidden", message: "Staff only" } });
      return;
    }
    if (readOnly) {
      reply.code(403).send(READ_ONLY_RESPONSE);
      return;
    }

    reply.send(SweepExpiredHoldsResponseSchema.parse(await sweeper.sweep()));
  });
}
