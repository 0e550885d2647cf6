import cors from "@fastify/cors";
import Fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { StoreChecks } from "./services/health.service.js";

export interface ServerOptions {
  logger: FastifyServerOptions["logger"];
  checks: StoreChecks;
}

export async function buildServer(
  options: ServerOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  await app.register(errorHandler);

  registerApiRoutes(app, options.checks);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
