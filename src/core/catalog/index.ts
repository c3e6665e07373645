/**
 * Catalog Module
 *
 * Local product model, derived values, naming rules and TOML persistence.
 */

export * from "./interfaces/ICatalogRepository.js";
export * from "./models.js";
export * from "./product.js";
export * from "./names.js";
export * from "./schema.js";
export * from "./luau-export.js";
export * from "./toml-store.js";
