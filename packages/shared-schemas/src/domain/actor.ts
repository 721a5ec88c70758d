import { z } from "zod";

export const ActorRoleSchema = z.enum(["client", "staff", "admin"]);

/** The caller as asserted by the upstream identity gateway. */
export const ActorSchema = z.object({
  actor_id: z.string().min(1),
  role: ActorRoleSchema,
});

export type ActorRole = z.infer<typeof ActorRoleSchema>;
export type Actor = z.infer<typeof ActorSchema>;
