import Fastify, { type FastifyInstance } from "fastify";
import type { Env } from "../config/env.js";
import { createAppContext, type AppContext } from "../app/context.js";
import { createLogger, loggerOptions } from "../observability/logger.js";
import { sendError } from "./errors.js";
import { registerToolRoutes } from "./routes/tools/index.js";

export type BuildServerOptions = {
  logLevel?: string;
};

export function buildServer(ctx: AppContext, opts: BuildServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: opts.logLevel ? loggerOptions(opts.logLevel) : false });

  app.setErrorHandler((err, req, reply) => {
    sendError(req, reply, err);
  });

  app.get("/health", async () => ({ status: "ok", service: "backend" }));

  registerToolRoutes(app, ctx);
  return app;
}

export async function createHttpServer(env: Env): Promise<FastifyInstance> {
  const logger = createLogger(env.LOG_LEVEL);
  const ctx = await createAppContext(env, logger);
  const app = buildServer(ctx, { logLevel: env.LOG_LEVEL });

  app.addHook("onClose", async () => {
    ctx.sweeper.stop();
    await ctx.close();
  });

  await app.listen({ host: "0.0.0.0", port: env.port });
  ctx.sweeper.start();
  app.log.info(`backend listening on ${env.backend_url}`);
  return app;
}
