/**
 * Pipeline error types
 *
 * Every wrapper keeps the store error it was raised for as `cause` and
 * repeats its message, so the underlying failure reaches the process boundary.
 */

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "ConfigError";
    this.details = details;
  }
}

/**
 * A dependent store never answered its probe within the readiness window.
 */
export class ReadinessTimeoutError extends Error {
  code = "READINESS_TIMEOUT" as const;
  store: string;
  timeoutMs: number;
  attempts: number;

  constructor(
    store: string,
    timeoutMs: number,
    attempts: number,
    cause: unknown
  ) {
    super(
      `${store} not ready after ${String(timeoutMs)}ms (${String(attempts)} attempts): ${describe(cause)}`,
      { cause }
    );
    this.name = "ReadinessTimeoutError";
    this.store = store;
    this.timeoutMs = timeoutMs;
    this.attempts = attempts;
  }
}

export class SourceQueryError extends Error {
  code = "SOURCE_QUERY_ERROR" as const;
  relation: string;

  constructor(relation: string, cause: unknown) {
    super(`Failed to read relation "${relation}": ${describe(cause)}`, {
      cause,
    });
    this.name = "SourceQueryError";
    this.relation = relation;
  }
}

export class SchemaSetupError extends Error {
  code = "SCHEMA_SETUP_ERROR" as const;
  statement: string;

  constructor(statement: string, cause: unknown) {
    super(`Schema statement failed: ${describe(cause)}`, { cause });
    this.name = "SchemaSetupError";
    this.statement = statement;
  }
}

/**
 * A batched upsert was rejected. Batches written before it stay committed.
 */
export class GraphWriteError extends Error {
  code = "GRAPH_WRITE_ERROR" as const;
  operation: string;
  batch: number;

  constructor(operation: string, batch: number, cause: unknown) {
    super(
      `Upsert "${operation}" failed on batch ${String(batch)}: ${describe(cause)}`,
      { cause }
    );
    this.name = "GraphWriteError";
    this.operation = operation;
    this.batch = batch;
  }
}
