#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadOptions } from "./commands/download.js";
import { resolveCommand, type ResolveOptions } from "./commands/resolve.js";
import { parseInteger } from "./settings.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

const program = new Command();

program
  .name("hlsgrab")
  .description("Download HLS playlists into a single video file")
  .version("0.1.0");

program
  .command("download <url> [output]")
  .description("Resolve a playlist, download its segments and stitch them together")
  .option("--debug", "Print every pipeline event instead of progress bars")
  .option("-o, --output-dir <dir>", "Directory for the output file (when no output is given)")
  .option("-c, --concurrency <n>", "Parallel segment downloads", parseInteger)
  .option("--max-hops <n>", "Maximum playlist documents to follow", parseInteger)
  .option("--segment-filter <name>", "Segment classification: heuristic or grammar")
  .action(
    wrapAction((url: string, output: string | undefined, options: DownloadOptions) =>
      downloadCommand(url, output, options)
    )
  );

program
  .command("resolve <url>")
  .description("Show the chosen variant and its segments without downloading")
  .option("--debug", "Print every resolution step")
  .option("--max-hops <n>", "Maximum playlist documents to follow", parseInteger)
  .option("--segment-filter <name>", "Segment classification: heuristic or grammar")
  .option("-a, --all", "List every segment instead of the first few")
  .option("--probe", "Check that the first segment is reachable")
  .action(wrapAction((url: string, options: ResolveOptions) => resolveCommand(url, options)));

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();
