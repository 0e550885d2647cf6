/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { isHealthy, type StoreChecks } from "../services/health.service.js";

import type { HealthResponse } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    ok: Type.Boolean(),
  },
  {
    examples: [{ ok: true }],
  }
);

export function registerApiRoutes(
  app: FastifyInstance,
  checks: StoreChecks
): void {
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "True when both the source store and the graph store answer a " +
          "fresh round trip",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async (): Promise<HealthResponse> => ({ ok: await isHealthy(checks) })
  );
}
