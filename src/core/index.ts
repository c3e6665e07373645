/**
 * Core module - Shared functionality between the CLI and library consumers
 */

export * from "./errors.js";
export * from "./config.js";

export * from "./catalog/index.js";
export * from "./api/index.js";
export * from "./reconciliation/index.js";
export * from "./sync/index.js";
