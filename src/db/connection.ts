import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";

import type { SourceDatabase } from "./types.js";
import type { SourceConfig } from "../config.js";

const { Client, Pool, types } = pg;

// Keep DATE/TIMESTAMP/TIMESTAMPTZ as the stored text. The default parsers
// build a Date in the process time zone, which would shift calendar dates
// before the normalizer ever sees them.
const keepText = (val: string): string => val;
types.setTypeParser(types.builtins.DATE, keepText);
types.setTypeParser(types.builtins.TIMESTAMP, keepText);
types.setTypeParser(types.builtins.TIMESTAMPTZ, keepText);

/**
 * INT8/BIGSERIAL arrive as text by default, which would turn BIGINT keys into
 * graph strings that never MATCH an INTEGER foreign key. Values past the safe
 * integer range become a bigint instead of losing precision.
 */
export function parseInt8(val: string): number | bigint {
  const parsed = Number(val);
  return Number.isSafeInteger(parsed) ? parsed : BigInt(val);
}
types.setTypeParser(types.builtins.INT8, parseInt8);

// ============================================================================
// Kysely Instance
// ============================================================================

/**
 * Create a Kysely handle over a single-connection pool. Callers own the
 * handle and must `destroy()` it; nothing is shared between stages.
 */
export function createSourceDb(config: SourceConfig): Kysely<SourceDatabase> {
  const pool = new Pool({
    connectionString: config.url,
    max: 1,
    connectionTimeoutMillis: 5000,
  });

  return new Kysely<SourceDatabase>({
    dialect: new PostgresDialect({ pool }),
  });
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * One-shot round trip against the source store. Rejects when unreachable.
 */
export async function pingSource(config: SourceConfig): Promise<void> {
  const client = new Client({
    connectionString: config.url,
    connectionTimeoutMillis: 5000,
  });

  await client.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    await client.end();
  }
}
