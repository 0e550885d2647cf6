import ora from "ora";

import { maskUrl } from "../../config.js";
import { createStoreChecks } from "../../server/services/health.service.js";
import { bootstrap } from "../utils/bootstrap.js";
import { displayStoreStatus, errorMessage } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Check Command
// ============================================================================

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Check that the source and graph stores are reachable")
    .action(async () => {
      const spinner = ora("Checking stores...").start();

      try {
        const { config, logger } = bootstrap();
        const checks = createStoreChecks(config, logger);

        // Probe both, unlike /health, so the table shows each store
        const source = await checks.source();
        const graph = await checks.graph();

        if (source && graph) {
          spinner.succeed("Both stores reachable");
        } else {
          spinner.fail("Store check failed");
          process.exitCode = 1;
        }

        displayStoreStatus([
          {
            store: "source",
            target: maskUrl(config.source.url),
            reachable: source,
          },
          { store: "graph", target: config.graph.uri, reachable: graph },
        ]);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
