/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./async.js";
export * from "./validation.js";

// =============================================================================
// Paths
// =============================================================================

export const CATALOG_FILE = "products.toml";

export function getCatalogPath(projectRoot: string = process.cwd()): string {
  return path.join(projectRoot, CATALOG_FILE);
}
