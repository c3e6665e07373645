/**
 * On-disk catalog schema (TOML, hyphenated keys) and conversion to the model.
 */

import { z } from "zod";
import type { Catalog, CatalogMetadata, Product } from "./models.js";

export const ProductEntrySchema = z.object({
  id: z.number().int().nonnegative().optional(),
  name: z.string(),
  prefix: z.string().optional(),
  description: z.string().optional(),
  active: z.boolean(),
  discount: z.number().int().min(0).max(100).optional(),
  price: z.number().int().nonnegative(),
  "regional-pricing": z.boolean().optional(),
});

export type ProductEntry = z.infer<typeof ProductEntrySchema>;

export const MetadataSchema = z.object({
  "universe-id": z.number().int().nonnegative(),
  "discount-prefix": z.string().optional(),
  "luau-file": z.string().optional(),
  "name-filters": z.array(z.string()).optional(),
});

export type MetadataEntry = z.infer<typeof MetadataSchema>;

export const CatalogFileSchema = z.object({
  metadata: MetadataSchema,
  gamepasses: z.record(ProductEntrySchema).default({}),
  products: z.record(ProductEntrySchema).default({}),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

/** Keys the engine owns inside a product table, in write order */
export const PRODUCT_KEYS = [
  "id",
  "prefix",
  "name",
  "description",
  "active",
  "discount",
  "price",
  "regional-pricing",
] as const;

/** Keys the engine owns inside the metadata table, in write order */
export const METADATA_KEYS = [
  "universe-id",
  "discount-prefix",
  "luau-file",
  "name-filters",
] as const;

export function entryToProduct(entry: ProductEntry): Product {
  return {
    id: entry.id,
    name: entry.name,
    prefix: entry.prefix,
    description: entry.description,
    active: entry.active,
    discount: entry.discount,
    price: entry.price,
    regionalPricing: entry["regional-pricing"],
  };
}

export function productToEntry(
  product: Product
): Record<(typeof PRODUCT_KEYS)[number], string | number | boolean | undefined> {
  return {
    id: product.id,
    prefix: product.prefix,
    name: product.name,
    description: product.description,
    active: product.active,
    discount: product.discount,
    price: product.price,
    "regional-pricing": product.regionalPricing,
  };
}

export function metadataToEntry(
  metadata: CatalogMetadata
): Record<(typeof METADATA_KEYS)[number], string | number | string[] | undefined> {
  return {
    "universe-id": metadata.universeId,
    "discount-prefix": metadata.discountPrefix,
    "luau-file": metadata.luauFile,
    "name-filters": metadata.nameFilters?.map((filter) => filter.source),
  };
}

export function fileToCatalog(
  file: CatalogFile,
  compileFilters: (patterns: readonly string[]) => RegExp[]
): Catalog {
  const filters = file.metadata["name-filters"];
  return {
    metadata: {
      universeId: file.metadata["universe-id"],
      discountPrefix: file.metadata["discount-prefix"],
      luauFile: file.metadata["luau-file"],
      nameFilters: filters ? compileFilters(filters) : undefined,
    },
    gamepasses: new Map(
      Object.entries(file.gamepasses).map(([key, entry]) => [key, entryToProduct(entry)] as const)
    ),
    products: new Map(
      Object.entries(file.products).map(([key, entry]) => [key, entryToProduct(entry)] as const)
    ),
  };
}
