/**
 * Merge Engine (download direction)
 *
 * Folds freshly fetched remote records into the local catalog. Locally owned
 * fields (prefix, description, discount, and price unless overwriting) stay
 * put; redacted descriptions from the platform are never adopted over
 * existing text.
 */

import {
  PRODUCT_KINDS,
  cloneCatalog,
  collectionFor,
  remoteCollectionFor,
  type Catalog,
  type Product,
  type ProductKind,
  type RemoteCatalog,
} from "../catalog/models.js";
import { hasDiscount, normalizeProduct } from "../catalog/product.js";
import { canonicalName, isCensored, slugify } from "../catalog/names.js";

export interface MergeOptions {
  /** Remote values win for name, prefix, description, price and regional pricing */
  overwrite: boolean;
}

export interface MergeResult {
  catalog: Catalog;
  /** Catalog keys of products that were not in the catalog before */
  added: Array<{ kind: ProductKind; key: string }>;
  /** Number of remote records matched to an existing entry */
  matched: number;
}

/**
 * Merges one remote record with its local match (if any).
 */
export function mergeProduct(
  remote: Product,
  existing: Product | undefined,
  options: MergeOptions & { nameFilters?: readonly RegExp[] }
): Product {
  const { overwrite, nameFilters } = options;
  const keepLocal = existing !== undefined && !overwrite;

  let description = keepLocal ? existing.description : remote.description;
  if (existing && description !== undefined && isCensored(description)) {
    description = existing.description;
  }

  return normalizeProduct({
    id: remote.id,
    name: canonicalName(keepLocal ? existing.name : remote.name, nameFilters),
    prefix: keepLocal ? existing.prefix : undefined,
    description,
    active: remote.active,
    discount: existing && hasDiscount(existing) ? existing.discount : undefined,
    price: keepLocal ? existing.price : remote.price,
    regionalPricing: keepLocal ? existing.regionalPricing : remote.regionalPricing,
  });
}

/**
 * Merges every remote record into a copy of the catalog. Matches are by
 * remote id within the same kind; the first local entry with the id wins.
 */
export function mergeRemoteCatalog(
  catalog: Catalog,
  remote: RemoteCatalog,
  options: MergeOptions
): MergeResult {
  const merged = cloneCatalog(catalog);
  const nameFilters = merged.metadata.nameFilters;
  const added: MergeResult["added"] = [];
  let matched = 0;

  for (const kind of PRODUCT_KINDS) {
    const collection = collectionFor(merged, kind);

    for (const record of remoteCollectionFor(remote, kind)) {
      const match = findById(collection, record.id);
      const product = mergeProduct(record, match?.product, { ...options, nameFilters });

      if (match) {
        matched++;
        collection.set(match.key, product);
      } else {
        const key = uniqueKey(collection, newKey(record, kind, nameFilters));
        collection.set(key, product);
        added.push({ kind, key });
      }
    }
  }

  return { catalog: merged, added, matched };
}

function findById(
  collection: Map<string, Product>,
  id: number | undefined
): { key: string; product: Product } | undefined {
  if (id === undefined) return undefined;
  for (const [key, product] of collection) {
    if (product.id === id) return { key, product };
  }
  return undefined;
}

/**
 * Key for a product new to the catalog, derived from its canonical remote name.
 */
export function newKey(record: Product, kind: ProductKind, nameFilters?: readonly RegExp[]): string {
  const slug = slugify(canonicalName(record.name, nameFilters));
  return slug.length > 0 ? slug : `${kind}-${record.id ?? "new"}`;
}

function uniqueKey(collection: Map<string, Product>, base: string): string {
  if (!collection.has(base)) return base;
  let suffix = 2;
  while (collection.has(`${base}-${suffix}`)) suffix++;
  return `${base}-${suffix}`;
}
