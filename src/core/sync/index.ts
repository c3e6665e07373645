/**
 * Sync Module
 *
 * Download and upload flows over the catalog repository and the product API.
 */

export * from "./interfaces/IConfirmer.js";
export * from "./types.js";
export * from "./downloader.js";
export * from "./uploader.js";
