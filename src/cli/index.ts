#!/usr/bin/env node

/**
 * product-sync CLI
 * Keeps products.toml and the platform's game passes and developer products in step
 */

import { Command } from "commander";
import chalk from "chalk";
import { initCommand, type InitOptions } from "./commands/init.js";
import { downloadCommand } from "./commands/download.js";
import { syncCommand } from "./commands/sync.js";
import { CLI_VERSION, type GlobalOptions } from "./context.js";
import { isProductSyncError } from "../core/errors.js";
import { loadEnvFile } from "../core/config.js";
import { CATALOG_FILE, createLogger, setLogLevel } from "../utils/index.js";

const logger = createLogger("cli");

loadEnvFile();

const program = new Command();

program
  .name("product-sync")
  .description("Sync a local product catalog with Roblox game passes and developer products")
  .version(CLI_VERSION)
  .option("-o, --overwrite", "Let remote values win and skip every prompt")
  .option("-y, --yes", "Answer yes to every prompt and select every change")
  .option("-c, --catalog <path>", "Catalog file", CATALOG_FILE)
  .option("-d, --debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", () => {
    if (program.opts<GlobalOptions>().debug) {
      setLogLevel("debug");
    }
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("init")
  .description(`Create a starter ${CATALOG_FILE}`)
  .option("-u, --universe-id <id>", "Universe the catalog belongs to")
  .action((options: Pick<InitOptions, "universeId">) =>
    initCommand({ ...program.opts<GlobalOptions>(), ...options })
  );

program
  .command("download")
  .description("Fetch remote products and merge them into the catalog")
  .action(() => downloadCommand(program.opts<GlobalOptions>()));

program
  .command("sync")
  .description("Create missing products and upload local changes")
  .action(() => syncCommand(program.opts<GlobalOptions>()));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    const code = isProductSyncError(error) ? ` [${error.code}]` : "";
    console.error(chalk.red(`\nError${code}: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, exiting`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

program.parseAsync(process.argv).catch(handleError);
