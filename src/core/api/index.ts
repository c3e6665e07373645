/**
 * Remote API Module
 *
 * Rate-limited transport, cursor pagination and the product client.
 */

export * from "./interfaces/IProductApi.js";
export * from "./transport.js";
export * from "./pagination.js";
export * from "./schemas.js";
export * from "./mapping.js";
export * from "./client.js";
