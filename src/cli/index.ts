#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { loadSettings } from "../config/configManager.js";
import { YtDlpEngine } from "../engine/ytDlp.js";
import { createLoggingContext } from "../logging/logger.js";
import { createShutdownManager } from "../shared/shutdown.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadCommandOptions } from "./commands/download.js";
import { EXIT_CODES, type ExitCode, resolveExitCode } from "./exitCodes.js";

const logging = createLoggingContext();
const { logger } = logging;

let engine: YtDlpEngine | undefined;

const shutdown = createShutdownManager(logger);
shutdown.setup();
shutdown.registerCleanup(() => engine?.abort());
shutdown.registerCleanup(() => logging.close());

const program = new Command();

program
  .name("ytd")
  .description("Download YouTube videos and playlists")
  .version("0.1.0")
  // Errors surface as CommanderError so they share the exit-code mapping below
  .exitOverride();

// Download command (default, so `ytd <url>` works)
program
  .command("download <url>", { isDefault: true })
  .description("Download a YouTube video or playlist")
  .option("--cookies <path>", "Path to a Netscape-formatted cookies file")
  .action(async (url: string, options: DownloadCommandOptions) => {
    const settings = loadSettings();
    engine = new YtDlpEngine({ binary: settings.ytDlpPath });
    await downloadCommand(url, options, { engine, logger, settings });
  });

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

async function main(): Promise<ExitCode> {
  logger.info("application_started");
  try {
    await program.parseAsync();
    return EXIT_CODES.success;
  } catch (error) {
    return resolveExitCode(error, logger);
  } finally {
    await logging.close();
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(chalk.red("\n❌ Fatal error"));
    if (error instanceof Error) {
      console.error(chalk.gray(`   ${error.message}`));
    }
    process.exitCode = EXIT_CODES.unhandled;
  }
);
