/**
 * sync command - Create missing products and push local changes
 */

import chalk from "chalk";
import ora from "ora";
import { Uploader } from "../../core/sync/uploader.js";
import { isProductSyncError, ErrorCode } from "../../core/errors.js";
import { kindLabel } from "../../core/catalog/models.js";
import type { UploadResult } from "../../core/sync/types.js";
import { createLogger } from "../../utils/index.js";
import { AutoConfirmer, PromptConfirmer } from "../confirmers.js";
import { createContext, type GlobalOptions } from "../context.js";

const logger = createLogger("sync");

export async function syncCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();
  const { config, deps } = createContext(options, spinner);

  const uploader = new Uploader({
    ...deps,
    confirmer: options.yes ? new AutoConfirmer() : new PromptConfirmer(),
    createConcurrency: config.createConcurrency,
  });

  let result: UploadResult;
  try {
    result = await uploader.upload({ overwrite: options.overwrite ?? false });
  } catch (error) {
    spinner.fail(chalk.red("Sync failed"));
    if (isProductSyncError(error) && error.code === ErrorCode.SYNC_UPDATE_FAILED) {
      console.log(chalk.dim(`Catalog saved; ${String(error.context?.completed ?? 0)} products were synced before the failure.`));
    }
    logger.error({ err: error }, "Sync failed");
    throw error;
  }

  printSummary(result);
  if (result.creation.failed.length > 0) {
    process.exitCode = 1;
  }
}

export function printSummary({ creation, modification }: UploadResult): void {
  console.log();
  console.log(chalk.white.bold("Creation"));
  switch (creation.status) {
    case "none":
      console.log(chalk.dim("  Nothing to create"));
      break;
    case "skipped":
      console.log(chalk.yellow("  Skipped"));
      break;
    case "completed":
      for (const { kind, key, id } of creation.created) {
        console.log(chalk.green(`  + ${kindLabel(kind)} ${key} (ID: ${id})`));
      }
      for (const { kind, key, error } of creation.failed) {
        console.log(chalk.red(`  x ${kindLabel(kind)} ${key}: ${error}`));
      }
      break;
  }

  console.log();
  console.log(chalk.white.bold("Modification"));
  switch (modification.status) {
    case "up-to-date":
      console.log(chalk.dim("  Everything is up to date"));
      break;
    case "aborted":
      console.log(chalk.yellow(`  Aborted, ${modification.pending} differences left unsynced`));
      break;
    case "nothing-selected":
      console.log(chalk.yellow("  No products selected"));
      break;
    case "completed":
      console.log(chalk.green(`  Synced ${modification.updated.length} of ${modification.pending} products`));
      break;
  }
}
