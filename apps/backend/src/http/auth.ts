import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { ActorRoleSchema, type Actor } from "@courtbook/shared-schemas";
import { invalidRequest } from "./errors.js";

// Set by the upstream identity gateway after it has verified the caller.
const ActorHeadersSchema = z.object({
  "x-actor-id": z.string().min(1),
  "x-actor-role": ActorRoleSchema.default("client"),
});

/** Sends the rejection itself and returns null when the caller is not accepted. */
export function authenticate(req: FastifyRequest, reply: FastifyReply, apiKey: string): Actor | null {
  const auth = req.headers["authorization"];
  if (auth !== `Bearer ${apiKey}`) {
    reply.code(401).send({ error: { kind: "Unauthorized", message: "Unauthorized" } });
    return null;
  }

  const parsed = ActorHeadersSchema.safeParse(req.headers);
  if (!parsed.success) {
    reply.code(400).send(invalidRequest(parsed.error, "Missing or invalid actor headers"));
    return null;
  }
  return { actor_id: parsed.data["x-actor-id"], role: parsed.data["x-actor-role"] };
}

export function isStaff(actor: Actor): boolean {
  return actor.role === "staff" || actor.role === "admin";
}
