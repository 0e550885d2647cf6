#!/usr/bin/env node

/**
 * Shop Graph Loader CLI
 *
 * Loads the shop's relational dataset (Postgres) into a property graph
 * (Neo4j). Running without a command performs one full load.
 */

import { Command } from "commander";

import { registerCheckCommand } from "./commands/check.js";
import { registerRunCommand, runPipeline } from "./commands/run.js";
import { registerSchemaCommand } from "./commands/schema.js";

const program = new Command();

program
  .name("graph-loader")
  .description("Relational shop data → Neo4j property graph loader")
  .version("0.1.0");

// Register all commands
registerRunCommand(program);
registerCheckCommand(program);
registerSchemaCommand(program);

// Default to a full run if no command specified
program.action(runPipeline);

await program.parseAsync();
