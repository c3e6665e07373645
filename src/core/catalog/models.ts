/**
 * Catalog Models
 *
 * In-memory shape of the local, version-controlled product catalog.
 */

/**
 * The two monetization record kinds the platform serves from separate endpoints.
 * `product` is a developer product (one-time purchase).
 */
export type ProductKind = "gamepass" | "product";

export const PRODUCT_KINDS: readonly ProductKind[] = ["gamepass", "product"];

export interface Product {
  /** Remote identifier; absent until the product is created on the platform */
  id?: number;
  name: string;
  prefix?: string;
  description?: string;
  /** Whether the product is for sale */
  active: boolean;
  /** Discount percentage, 0-100 */
  discount?: number;
  /** Base price in the platform currency's smallest unit */
  price: number;
  /** `false` is never stored; see normalizeProduct */
  regionalPricing?: boolean;
}

export interface CatalogMetadata {
  universeId: number;
  /** Template with a `{}` slot for the discount percentage */
  discountPrefix?: string;
  /** Generated export script, relative to the catalog file */
  luauFile?: string;
  /** Name canonicalization patterns; empty or absent means the built-in set */
  nameFilters?: RegExp[];
}

export interface Catalog {
  metadata: CatalogMetadata;
  gamepasses: Map<string, Product>;
  products: Map<string, Product>;
}

/**
 * Products fetched from the platform, already converted from their wire shape.
 */
export interface RemoteCatalog {
  gamepasses: Product[];
  products: Product[];
}

export function collectionFor(catalog: Catalog, kind: ProductKind): Map<string, Product> {
  return kind === "gamepass" ? catalog.gamepasses : catalog.products;
}

export function remoteCollectionFor(remote: RemoteCatalog, kind: ProductKind): Product[] {
  return kind === "gamepass" ? remote.gamepasses : remote.products;
}

export function kindLabel(kind: ProductKind): string {
  return kind === "gamepass" ? "game pass" : "developer product";
}

/**
 * Deep-enough copy for the engine: products are flat records, regexes are immutable.
 */
export function cloneCatalog(catalog: Catalog): Catalog {
  const copy = (source: Map<string, Product>) =>
    new Map([...source].map(([key, product]) => [key, { ...product }] as const));

  return {
    metadata: {
      ...catalog.metadata,
      nameFilters: catalog.metadata.nameFilters ? [...catalog.metadata.nameFilters] : undefined,
    },
    gamepasses: copy(catalog.gamepasses),
    products: copy(catalog.products),
  };
}

export function productCount(catalog: Catalog): number {
  return catalog.gamepasses.size + catalog.products.size;
}
