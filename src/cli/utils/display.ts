/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { PipelineResult } from "../../services/etl/index.js";

/**
 * Display per-step load counters
 */
export function displayLoadSummary(result: PipelineResult): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Step"),
      chalk.cyan("Rows"),
      chalk.cyan("Batches"),
      chalk.cyan("Nodes +"),
      chalk.cyan("Rels +"),
      chalk.cyan("Props set"),
    ],
    colWidths: [14, 10, 10, 10, 10, 12],
  });

  for (const step of result.summary.steps) {
    table.push([
      step.step,
      String(step.rows),
      String(step.batches),
      String(step.nodesCreated),
      String(step.relationshipsCreated),
      String(step.propertiesSet),
    ]);
  }

  console.log(table.toString());
  console.log(`  Schema statements: ${String(result.summary.schemaStatements)}`);

  const skipped = Object.entries(result.summary.skippedEvents);
  if (skipped.length > 0) {
    console.log(chalk.yellow("  Skipped events (unrecognized type):"));
    for (const [eventType, count] of skipped) {
      console.log(`    ${eventType}: ${String(count)}`);
    }
  }

  const degraded = Object.entries(result.degraded);
  if (degraded.length > 0) {
    console.log(chalk.yellow("  Unparsable temporal values (set to null):"));
    for (const [column, count] of degraded) {
      console.log(`    ${column}: ${String(count)}`);
    }
  }

  console.log(chalk.gray(`  Completed in ${String(result.durationMs)}ms`));
}

/**
 * Display reachability of each store
 */
export function displayStoreStatus(
  statuses: { store: string; target: string; reachable: boolean }[]
): void {
  const table = new CliTable3({
    head: [chalk.cyan("Store"), chalk.cyan("Target"), chalk.cyan("Status")],
    colWidths: [10, 50, 14],
    wordWrap: true,
  });

  for (const status of statuses) {
    table.push([
      status.store,
      status.target,
      status.reachable ? chalk.green("reachable") : chalk.red("unreachable"),
    ]);
  }

  console.log(table.toString());
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print the chain of underlying errors behind a failure
 */
export function reportCause(error: unknown): void {
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    const message = cause instanceof Error ? cause.message : String(cause);
    console.error(chalk.gray(`  caused by: ${message}`));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}
