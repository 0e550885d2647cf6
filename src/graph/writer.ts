/**
 * Graph Writer
 *
 * The loader's only view of the graph store: run a DDL statement, or send
 * one batch to a named upsert operation.
 */

import neo4j, { type Driver, type Integer, type Session } from "neo4j-driver";

import {
  UPSERT_STATEMENTS,
  type UpsertOperation,
  type UpsertRows,
} from "./statements.js";

// ============================================================================
// Types
// ============================================================================

/** Driver counters for one write */
export interface WriteStats {
  nodesCreated: number;
  relationshipsCreated: number;
  propertiesSet: number;
}

export interface GraphWriter {
  /** Run a single statement in its own auto-commit transaction */
  run(statement: string): Promise<void>;
  /** Upsert one batch in a single round trip */
  write<K extends UpsertOperation>(
    operation: K,
    rows: readonly UpsertRows[K][]
  ): Promise<WriteStats>;
  close(): Promise<void>;
}

// ============================================================================
// Parameter Conversion
// ============================================================================

type CypherValue = string | number | boolean | null | Integer;

/**
 * JS numbers reach Neo4j as floats. Integral values (and bigints from INT8
 * columns) are sent as driver integers so ids and quantities keep their
 * integer type; the statements apply toFloat() where a float is wanted.
 */
export function toCypherValue(value: unknown): CypherValue {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? neo4j.int(value) : value;
  }
  if (typeof value === "bigint") {
    return neo4j.int(value.toString());
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  return null;
}

export function toCypherRow(row: object): Record<string, CypherValue> {
  const result: Record<string, CypherValue> = {};
  for (const [key, value] of Object.entries(row)) {
    result[key] = toCypherValue(value);
  }
  return result;
}

// ============================================================================
// Neo4j Implementation
// ============================================================================

/**
 * Writer over one session. When given the driver that opened the session,
 * closing the writer closes the driver too.
 */
export class Neo4jGraphWriter implements GraphWriter {
  constructor(
    private readonly session: Session,
    private readonly driver?: Driver
  ) {}

  async run(statement: string): Promise<void> {
    await this.session.run(statement);
  }

  async write<K extends UpsertOperation>(
    operation: K,
    rows: readonly UpsertRows[K][]
  ): Promise<WriteStats> {
    const result = await this.session.run(UPSERT_STATEMENTS[operation], {
      rows: rows.map((row) => toCypherRow(row)),
    });
    const updates = result.summary.counters.updates();

    return {
      nodesCreated: updates.nodesCreated,
      relationshipsCreated: updates.relationshipsCreated,
      propertiesSet: updates.propertiesSet,
    };
  }

  async close(): Promise<void> {
    try {
      await this.session.close();
    } finally {
      await this.driver?.close();
    }
  }
}
