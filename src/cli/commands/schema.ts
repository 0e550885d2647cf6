import ora from "ora";

import { openGraphWriter } from "../../graph/connection.js";
import {
  DEFAULT_SCHEMA_PATH,
  applySchema,
  readSchemaStatements,
} from "../../graph/schema.js";
import { bootstrap } from "../utils/bootstrap.js";
import { errorMessage, reportCause } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Schema Command
// ============================================================================

export function registerSchemaCommand(program: Command): void {
  program
    .command("schema")
    .description("Apply the graph uniqueness constraints without loading data")
    .action(async () => {
      const spinner = ora("Applying graph schema...").start();

      try {
        const { config, logger } = bootstrap();
        const statements = await readSchemaStatements(
          config.graph.schemaPath ?? DEFAULT_SCHEMA_PATH
        );
        const writer = await openGraphWriter(config.graph);

        try {
          const applied = await applySchema(writer, statements, logger);
          spinner.succeed(`Applied ${String(applied)} schema statements`);
        } finally {
          await writer.close();
        }
      } catch (error) {
        spinner.fail(`Schema setup failed: ${errorMessage(error)}`);
        reportCause(error);
        process.exitCode = 1;
      }
    });
}
