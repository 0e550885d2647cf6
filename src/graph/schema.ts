import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { SchemaSetupError } from "../errors.js";

import type { GraphWriter } from "./writer.js";
import type { Logger } from "../logger.js";

const currentFilePath = fileURLToPath(import.meta.url);
const currentDirPath = dirname(currentFilePath);

/** Constraint statements shipped beside this module */
export const DEFAULT_SCHEMA_PATH = join(currentDirPath, "queries.cypher");

const STATEMENT_DELIMITER = ";";

/**
 * Split a Cypher script into statements. Full-line `//` comments are
 * dropped and blank segments ignored.
 */
export function splitStatements(text: string): string[] {
  const withoutComments = text
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith("//"))
    .join("\n");

  return withoutComments
    .split(STATEMENT_DELIMITER)
    .map((statement) => statement.trim())
    .filter((statement) => statement !== "");
}

export async function readSchemaStatements(
  path: string = DEFAULT_SCHEMA_PATH
): Promise<string[]> {
  const text = await readFile(path, "utf8");
  return splitStatements(text);
}

/**
 * Run each statement in its own transaction, in order. A failure stops the
 * setup; statements already applied stay applied.
 *
 * @returns number of statements applied
 */
export async function applySchema(
  writer: GraphWriter,
  statements: readonly string[],
  logger: Logger
): Promise<number> {
  const log = logger.child({ module: "schema" });

  for (const statement of statements) {
    log.debug({ statement }, "Applying schema statement");
    try {
      await writer.run(statement);
    } catch (error) {
      log.error({ statement, error }, "Schema statement failed");
      throw new SchemaSetupError(statement, error);
    }
  }

  log.info({ statements: statements.length }, "Graph schema applied");
  return statements.length;
}
