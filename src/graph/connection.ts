import neo4j, { type Driver } from "neo4j-driver";

import { PING_STATEMENT } from "./statements.js";
import { Neo4jGraphWriter, type GraphWriter } from "./writer.js";

import type { GraphConfig } from "../config.js";

/**
 * Create a driver for one scoped use. Callers close it when done.
 */
export function createGraphDriver(config: GraphConfig): Driver {
  return neo4j.driver(
    config.uri,
    neo4j.auth.basic(config.username, config.password),
    {
      maxConnectionPoolSize: 1,
      connectionAcquisitionTimeout: 30_000,
    }
  );
}

/**
 * Open a writer owning its own driver and session; closing the writer
 * releases both.
 */
export async function openGraphWriter(
  config: GraphConfig
): Promise<GraphWriter> {
  const driver = createGraphDriver(config);
  try {
    await driver.verifyConnectivity();
  } catch (error) {
    await driver.close();
    throw error;
  }

  const session = driver.session(
    config.database !== undefined ? { database: config.database } : {}
  );
  return new Neo4jGraphWriter(session, driver);
}

/**
 * One-shot round trip against the graph store. Rejects when unreachable.
 */
export async function pingGraph(config: GraphConfig): Promise<void> {
  const driver = createGraphDriver(config);
  try {
    const session = driver.session(
      config.database !== undefined ? { database: config.database } : {}
    );
    try {
      await session.run(PING_STATEMENT);
    } finally {
      await session.close();
    }
  } finally {
    await driver.close();
  }
}
