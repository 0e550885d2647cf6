import chalk from "chalk";
import ora from "ora";

import { createPipeline } from "../../services/etl/index.js";
import { bootstrap } from "../utils/bootstrap.js";
import {
  displayLoadSummary,
  errorMessage,
  reportCause,
} from "../utils/display.js";

import type { PipelinePhase } from "../../services/etl/index.js";
import type { Command } from "commander";

// ============================================================================
// Run Command
// ============================================================================

const PHASE_LABELS: Record<PipelinePhase, string> = {
  readiness: "Waiting for stores...",
  extract: "Extracting source relations...",
  normalize: "Normalizing dates and timestamps...",
  load: "Loading graph...",
};

/**
 * Run the full pipeline once: readiness → extract → normalize → load.
 */
export async function runPipeline(): Promise<void> {
  const spinner = ora("Starting ETL...").start();

  try {
    const { config, logger } = bootstrap();
    const pipeline = createPipeline(config, logger);

    pipeline.setProgressCallback((progress) => {
      switch (progress.phase) {
        case "readiness":
          spinner.text = `Waiting for ${progress.detail ?? "stores"}...`;
          break;
        case "load":
          spinner.text =
            progress.detail !== undefined
              ? `Loading ${progress.detail}: batch ${String(progress.current ?? 0)}/${String(progress.total ?? 0)}`
              : "Loading graph...";
          break;
        default:
          spinner.text = PHASE_LABELS[progress.phase];
      }
    });

    const result = await pipeline.run();
    spinner.succeed(chalk.green("ETL done."));
    displayLoadSummary(result);
  } catch (error) {
    spinner.fail(`ETL failed: ${errorMessage(error)}`);
    reportCause(error);
    process.exitCode = 1;
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description(
      "Load the relational snapshot into the graph (waits for both stores)"
    )
    .action(runPipeline);
}
