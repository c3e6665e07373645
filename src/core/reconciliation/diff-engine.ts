/**
 * Diff Engine
 *
 * Field-level comparison between local products and their remote records.
 */

import {
  PRODUCT_KINDS,
  collectionFor,
  remoteCollectionFor,
  type Catalog,
  type CatalogMetadata,
  type Product,
  type ProductKind,
  type RemoteCatalog,
} from "../catalog/models.js";
import { effectivePrice, effectiveTitle, uploadTitle } from "../catalog/product.js";
import type {
  ChangeStatus,
  CreationCandidate,
  FieldChange,
  PendingUpdate,
  ProductDiff,
} from "./models/diff.js";
import { hasChanges } from "./models/diff.js";

function statusOf<T>(remote: T, local: T): ChangeStatus {
  return remote === local ? "unchanged" : "changed";
}

/**
 * Title compared against the platform. With metadata, the discount prefix the
 * upload would add is included; without it, a discounted product compares by raw name.
 */
function comparableTitle(product: Product, metadata?: CatalogMetadata): string {
  return metadata ? uploadTitle(product, metadata.discountPrefix) : effectiveTitle(product);
}

/**
 * Compares a local product with the remote record sharing its id.
 * Returns null when every field matches.
 */
export function diffProduct(
  local: Product,
  remote: Product,
  metadata?: CatalogMetadata
): ProductDiff | null {
  const title = comparableTitle(local, metadata);
  const description = local.description ?? "";
  const remoteDescription = remote.description ?? "";
  const price = effectivePrice(local);
  const regionalPricing = local.regionalPricing ?? false;
  const remoteRegionalPricing = remote.regionalPricing ?? false;

  const fields: FieldChange[] = [
    { field: "title", remote: remote.name, local: title, status: statusOf(remote.name, title) },
    {
      field: "description",
      remote: remoteDescription,
      local: description,
      status: statusOf(remoteDescription, description),
    },
    { field: "price", remote: remote.price, local: price, status: statusOf(remote.price, price) },
    {
      field: "regionalPricing",
      remote: remoteRegionalPricing,
      local: regionalPricing,
      status: statusOf(remoteRegionalPricing, regionalPricing),
    },
    {
      field: "active",
      remote: remote.active,
      local: local.active,
      status: statusOf(remote.active, local.active),
    },
  ];

  const diff: ProductDiff = { name: local.name, id: local.id ?? 0, fields };
  return hasChanges(diff) ? diff : null;
}

/**
 * Diffs every local product that carries an id against the remote record of
 * the same kind. Ids the platform no longer knows are skipped.
 *
 * Ordered developer products first, then game passes, each by ascending id.
 */
export function buildPendingUpdates(catalog: Catalog, remote: RemoteCatalog): PendingUpdate[] {
  const updates: PendingUpdate[] = [];

  for (const kind of PRODUCT_KINDS) {
    const remoteById = new Map<number, Product>();
    for (const record of remoteCollectionFor(remote, kind)) {
      if (record.id !== undefined && !remoteById.has(record.id)) {
        remoteById.set(record.id, record);
      }
    }

    for (const local of collectionFor(catalog, kind).values()) {
      if (local.id === undefined) continue;

      const match = remoteById.get(local.id);
      if (!match) continue;

      const diff = diffProduct(local, match, catalog.metadata);
      if (diff) {
        updates.push({ kind, diff });
      }
    }
  }

  return updates.sort(
    (a, b) => kindRank(a.kind) - kindRank(b.kind) || a.diff.id - b.diff.id
  );
}

function kindRank(kind: ProductKind): number {
  return kind === "product" ? 0 : 1;
}

/**
 * Local products without a remote id: game passes first, catalog order within each.
 */
export function findCreationCandidates(catalog: Catalog): CreationCandidate[] {
  const candidates: CreationCandidate[] = [];
  for (const kind of PRODUCT_KINDS) {
    for (const [key, product] of collectionFor(catalog, kind)) {
      if (product.id === undefined) {
        candidates.push({ kind, key, fields: describeCreation(product, catalog.metadata) });
      }
    }
  }
  return candidates;
}

/**
 * The values a creation would send, as `created` field changes.
 */
export function describeCreation(product: Product, metadata: CatalogMetadata): FieldChange[] {
  return [
    {
      field: "title",
      remote: null,
      local: uploadTitle(product, metadata.discountPrefix),
      status: "created",
    },
    { field: "description", remote: null, local: product.description ?? "", status: "created" },
    { field: "price", remote: null, local: effectivePrice(product), status: "created" },
    {
      field: "regionalPricing",
      remote: null,
      local: product.regionalPricing ?? false,
      status: "created",
    },
    { field: "active", remote: null, local: product.active, status: "created" },
  ];
}
