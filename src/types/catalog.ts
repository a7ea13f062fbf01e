// src/types/catalog.ts

export const PRICE_TIERS = ['budget', 'mid', 'premium', 'luxury'] as const;

export type PriceTier = (typeof PRICE_TIERS)[number];

export interface CategoryProfile {
  readonly item_type: string;
  readonly base_wear_count: number;
  readonly reference_price: number;
  readonly base_lifespan_months?: number;
}

export interface BrandProfile {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description: string | null;
  readonly quality_baseline: number;      // 0..100
  readonly durability_rating: number;     // 0..100
  readonly transparency_score: number;    // 0..100, supply-chain / ethics signal
  readonly price_tier: PriceTier;
  readonly category_overrides: Readonly<Record<string, number>>;
}

export interface PriceTierInfo {
  readonly typical_price_range: string;
}

/**
 * Read-only view over brand and category reference data.
 * Implementations are built once and never edited; a reload produces a new store.
 */
export interface CatalogStore {
  readonly version: string;
  lookupBrand(name: string): BrandProfile | undefined;
  lookupCategory(itemType: string): CategoryProfile | undefined;
  /** Ordered by item_type ascending. */
  listCategories(): readonly CategoryProfile[];
  /** Ordered by name, case-insensitive. */
  listBrands(): readonly BrandProfile[];
  priceRange(tier: PriceTier): string;
}
