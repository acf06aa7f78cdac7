#!/usr/bin/env node
/**
 * @testcast/cli
 *
 * CLI for testcast.
 * Commands: serve, generate, describe, sessions, export
 */

import { Command } from "commander";
import { LANGUAGES } from "@testcast/core";
import { serveCommand } from "./commands/serve.js";
import { generateCommand } from "./commands/generate.js";
import { describeCommand } from "./commands/describe.js";
import {
  sessionsListCommand,
  sessionsShowCommand,
} from "./commands/sessions.js";
import { exportCommand } from "./commands/export.js";

const program = new Command();

program
  .name("testcast")
  .description("Record browser sessions and turn them into test scripts")
  .version("0.1.0");

program
  .command("serve")
  .description("Start the recording service")
  .option("-p, --port <port>", "Port to listen on (overrides TC_LISTEN_PORT)")
  .option("--host <host>", "Interface to bind (overrides TC_HOST)")
  .action(async (options) => {
    await serveCommand(options);
  });

/** Code generation flags shared by generate and export */
function withGenerationFlags(command: Command): Command {
  return command
    .option("-l, --language <language>", `Target language (${LANGUAGES.join("|")})`)
    .option("-f, --framework <framework>", "Target framework")
    .option("--no-comments", "Leave out step comments")
    .option("--no-imports", "Leave out import lines")
    .option("--no-prettify", "Keep raw layout")
    .option("-o, --out <path>", "Output file path (stdout if not specified)");
}

withGenerationFlags(
  program
    .command("generate <file>")
    .description("Generate test code from a step file or saved session")
).action(async (file, options) => {
  await generateCommand(file, options);
});

program
  .command("describe <file>")
  .description("Print the steps of a file as an outline")
  .action(async (file) => {
    await describeCommand(file);
  });

// Sessions subcommand group
const sessions = program
  .command("sessions")
  .description("Query sessions on a running service");

sessions
  .command("list")
  .description("List sessions")
  .option("-s, --status <status>", "Filter by status (active|paused|completed|failed)")
  .action(async (options) => {
    await sessionsListCommand(options);
  });

sessions
  .command("show <id>")
  .description("Show session details and recorded steps")
  .action(async (id) => {
    await sessionsShowCommand(id);
  });

withGenerationFlags(
  program
    .command("export <id>")
    .description("Generate test code for a recorded session")
).action(async (id, options) => {
  await exportCommand(id, options);
});

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
