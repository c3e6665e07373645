/**
 * init command - Write a starter catalog for a universe
 */

import chalk from "chalk";
import * as p from "@clack/prompts";
import { z } from "zod";
import { CatalogError, ErrorCode, ProductSyncError } from "../../core/errors.js";
import { TomlCatalogStore } from "../../core/catalog/toml-store.js";
import { DEFAULT_DISCOUNT_PREFIX } from "../../core/catalog/product.js";
import type { Catalog } from "../../core/catalog/models.js";
import { createLogger } from "../../utils/index.js";
import { catalogPath, type GlobalOptions } from "../context.js";

const logger = createLogger("init");

export const DEFAULT_LUAU_FILE = "products.luau";

const UniverseIdSchema = z.coerce.number().int().positive();

export interface InitOptions extends GlobalOptions {
  universeId?: string;
}

/**
 * Starter catalog: metadata only, no products.
 */
export function starterCatalog(universeId: number): Catalog {
  return {
    metadata: {
      universeId,
      discountPrefix: DEFAULT_DISCOUNT_PREFIX,
      luauFile: DEFAULT_LUAU_FILE,
    },
    gamepasses: new Map(),
    products: new Map(),
  };
}

export function parseUniverseId(value: string): number {
  const result = UniverseIdSchema.safeParse(value);
  if (!result.success) {
    throw new ProductSyncError(`Invalid universe id: ${value}`, ErrorCode.INVALID_ARGUMENT, {
      value,
    });
  }
  return result.data;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const store = new TomlCatalogStore(catalogPath(options));
  logger.info({ options }, "Starting initialization");

  if (await store.exists()) {
    throw new CatalogError(
      `Catalog already exists: ${store.location}`,
      ErrorCode.CATALOG_ALREADY_EXISTS,
      { filePath: store.location }
    );
  }

  const universeId = parseUniverseId(options.universeId ?? (await askUniverseId(options)));
  await store.save(starterCatalog(universeId));
  logger.info({ path: store.location, universeId }, "Catalog created");

  console.log(chalk.green(`Created ${store.location}`));
  console.log(chalk.dim("Run"), chalk.white("product-sync download"), chalk.dim("to pull existing products."));
}

async function askUniverseId(options: InitOptions): Promise<string> {
  if (options.yes) {
    throw new ProductSyncError(
      "--universe-id is required with --yes",
      ErrorCode.INVALID_ARGUMENT
    );
  }

  const answer = await p.text({
    message: "Universe id",
    validate: (value) => (UniverseIdSchema.safeParse(value).success ? undefined : "Enter a positive integer"),
  });
  if (p.isCancel(answer)) {
    throw new ProductSyncError("Initialization cancelled", ErrorCode.INVALID_ARGUMENT);
  }
  return answer;
}
