/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Shop Graph Loader",
        description:
          "Liveness of the stores behind the relational-to-graph loader: " +
          "the Postgres source and the Neo4j graph.",
        version: "0.1.0",
      },
      tags: [
        {
          name: "Health",
          description: "Reachability of the source and graph stores",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
