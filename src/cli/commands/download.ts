/**
 * download command - Pull remote products into the catalog
 */

import chalk from "chalk";
import ora from "ora";
import { Downloader } from "../../core/sync/downloader.js";
import { kindLabel } from "../../core/catalog/models.js";
import { createLogger } from "../../utils/index.js";
import { createContext, type GlobalOptions } from "../context.js";

const logger = createLogger("download");

export async function downloadCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();
  const { deps } = createContext(options, spinner);

  try {
    const result = await new Downloader(deps).download({ overwrite: options.overwrite ?? false });

    console.log();
    console.log(chalk.white.bold("Download"));
    console.log(`  Remote products:  ${result.remoteTotal}`);
    console.log(`  Matched:          ${result.matched}`);
    console.log(`  Added:            ${chalk.green(result.added.length)}`);
    for (const { kind, key } of result.added) {
      console.log(chalk.dim(`    + ${kindLabel(kind)} ${key}`));
    }
  } catch (error) {
    spinner.fail(chalk.red("Download failed"));
    logger.error({ err: error }, "Download failed");
    throw error;
  }
}
