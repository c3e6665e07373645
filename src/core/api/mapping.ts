/**
 * Conversions between wire records and catalog products, and the multipart
 * body used by create and update calls.
 */

import type { Product } from "../catalog/models.js";
import { effectivePrice, effectiveTitle } from "../catalog/product.js";
import {
  REGIONAL_PRICING_FEATURE,
  type DeveloperProduct,
  type GamePass,
} from "./schemas.js";

export interface ProductUpdateRequest {
  name: string;
  description?: string;
  isForSale?: boolean;
  price?: number;
  isRegionalPricingEnabled?: boolean;
}

type RemoteRecord = Pick<GamePass, "name" | "description" | "isForSale" | "priceInformation">;

function recordToProduct(id: number, record: RemoteRecord): Product {
  const features = record.priceInformation?.enabledFeatures;
  return {
    id,
    name: record.name,
    description: record.description ?? undefined,
    active: record.isForSale,
    price: record.priceInformation?.defaultPriceInRobux ?? 0,
    regionalPricing: features ? features.includes(REGIONAL_PRICING_FEATURE) : undefined,
  };
}

export function gamePassToProduct(pass: GamePass): Product {
  return recordToProduct(pass.gamePassId, pass);
}

export function developerProductToProduct(product: DeveloperProduct): Product {
  return recordToProduct(product.productId, product);
}

/**
 * Request body for a product whose name already carries any discount prefix.
 */
export function toUpdateRequest(product: Product): ProductUpdateRequest {
  return {
    name: effectiveTitle(product),
    description: product.description,
    isForSale: product.active,
    price: effectivePrice(product),
    isRegionalPricingEnabled: product.regionalPricing,
  };
}

/**
 * Multipart form for create/update. A zero price is left out.
 */
export function toFormData(request: ProductUpdateRequest): FormData {
  const form = new FormData();
  form.set("name", request.name);

  if (request.description !== undefined) {
    form.set("description", request.description);
  }
  if (request.isForSale !== undefined) {
    form.set("isForSale", String(request.isForSale));
  }
  if (request.price !== undefined && request.price > 0) {
    form.set("price", String(request.price));
  }
  if (request.isRegionalPricingEnabled !== undefined) {
    form.set("isRegionalPricingEnabled", String(request.isRegionalPricingEnabled));
  }

  return form;
}
