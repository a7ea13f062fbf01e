import { z } from 'zod';
import { PRICE_TIERS } from '../types/catalog';

const rating = z.number().min(0).max(100);

export const categoryDoc = z.object({
  item_type: z.string().trim().min(1),
  base_wear_count: z.number().int().positive(),
  reference_price: z.number().positive(),
  base_lifespan_months: z.number().int().positive().optional(),
});

export const brandDoc = z.object({
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).default([]),
  description: z.string().nullish(),
  quality_baseline: rating,
  durability_rating: rating,
  transparency_score: rating,
  price_tier: z.enum(PRICE_TIERS),
  category_overrides: z.record(z.string(), z.number().min(-100).max(100)).default({}),
});

const tierInfo = z.object({ typical_price_range: z.string().min(1) });

export const catalogDoc = z.object({
  version: z.string().min(1),
  price_tiers: z.object({
    budget: tierInfo,
    mid: tierInfo,
    premium: tierInfo,
    luxury: tierInfo,
  }),
  categories: z.array(categoryDoc).min(1),
  brands: z.array(brandDoc),
});

export type CatalogDoc = z.infer<typeof catalogDoc>;
