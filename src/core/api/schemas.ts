/**
 * Wire schemas for the platform's game pass and developer product endpoints.
 * Only the fields the engine reads are declared; the rest are stripped.
 */

import { z } from "zod";

export const PriceInformationSchema = z.object({
  defaultPriceInRobux: z.number().int().nonnegative().nullish(),
  enabledFeatures: z.array(z.string()).nullish(),
});

export const GamePassSchema = z.object({
  gamePassId: z.number().int().nonnegative(),
  name: z.string(),
  description: z.string().nullish(),
  isForSale: z.boolean(),
  priceInformation: PriceInformationSchema.nullish(),
});

export type GamePass = z.infer<typeof GamePassSchema>;

export const DeveloperProductSchema = z.object({
  productId: z.number().int().nonnegative(),
  name: z.string(),
  description: z.string().nullish(),
  isForSale: z.boolean(),
  priceInformation: PriceInformationSchema.nullish(),
});

export type DeveloperProduct = z.infer<typeof DeveloperProductSchema>;

export interface Page<T> {
  items: T[];
  nextPageToken: string | null;
}

export const GamePassPageSchema = z
  .object({
    gamePasses: z.array(GamePassSchema).nullish(),
    nextPageToken: z.string().nullish(),
  })
  .transform((page): Page<GamePass> => ({
    items: page.gamePasses ?? [],
    nextPageToken: page.nextPageToken || null,
  }));

export const DeveloperProductPageSchema = z
  .object({
    developerProducts: z.array(DeveloperProductSchema).nullish(),
    nextPageToken: z.string().nullish(),
  })
  .transform((page): Page<DeveloperProduct> => ({
    items: page.developerProducts ?? [],
    nextPageToken: page.nextPageToken || null,
  }));

export const REGIONAL_PRICING_FEATURE = "RegionalPricing";
