/**
 * Derived product values: effective price, display title, discount prefix.
 */

import type { Product } from "./models.js";

export const DEFAULT_DISCOUNT_PREFIX = "💲{}% OFF💲";

export function hasDiscount(product: Product): boolean {
  return product.discount !== undefined && product.discount > 0;
}

/**
 * Price after discount, rounded down.
 */
export function effectivePrice(product: Product): number {
  if (product.discount !== undefined && product.discount > 0) {
    return Math.floor(product.price * (1 - product.discount / 100));
  }
  return product.price;
}

/**
 * Title shown to players. A discounted product shows its raw name; the
 * discount prefix replaces the regular prefix at upload time.
 */
export function effectiveTitle(product: Product): string {
  if (hasDiscount(product)) {
    return product.name;
  }
  return product.prefix ? `${product.prefix} ${product.name}` : product.name;
}

export function formatDiscountPrefix(template: string, discount: number): string {
  return template.replaceAll("{}", String(discount)).trimEnd();
}

/**
 * Returns a copy whose name carries the formatted discount prefix. Products
 * without an active discount come back unchanged.
 */
export function applyDiscountPrefix(product: Product, template?: string): Product {
  if (product.discount === undefined || product.discount <= 0) {
    return { ...product };
  }
  const prefix = formatDiscountPrefix(template ?? DEFAULT_DISCOUNT_PREFIX, product.discount);
  return { ...product, name: `${prefix} ${product.name}` };
}

/**
 * The title the platform ends up with once the product is uploaded.
 */
export function uploadTitle(product: Product, template?: string): string {
  return effectiveTitle(applyDiscountPrefix(product, template));
}

/**
 * `regionalPricing: false` is stored as absent.
 */
export function normalizeProduct(product: Product): Product {
  if (product.regionalPricing === false) {
    const { regionalPricing: _omitted, ...rest } = product;
    return rest;
  }
  return product;
}
