/**
 * product-sync
 *
 * Library entry: catalog persistence, the rate-limited Open Cloud client and
 * the download/upload flows, without the CLI's prompts and spinners.
 */

export * from "./core/index.js";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./utils/logger.js";
export { CATALOG_FILE, getCatalogPath } from "./utils/index.js";
