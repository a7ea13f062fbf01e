import { clamp, roundTo } from '../../common/text.util';
import type { BrandProfile, CatalogStore, CategoryProfile } from '../../types/catalog';
import type { Breakdown, ScoreResult } from '../../types/analysis';
import type { ScoringConfig } from './scoring.config';

export type FallbackResult = {
  baseline: number;                         // 0..100, unrounded
  breakdown: Breakdown;
};

/** Heuristic baseline for brands with no curated profile. */
export type FallbackStrategy = (
  price: number,
  category: CategoryProfile,
  params: ScoringConfig['fallback'],
) => FallbackResult;

// Extra term that keeps the breakdown summing to the clamped score.
function withClampAdjustment(breakdown: Breakdown, raw: number): { score: number; breakdown: Breakdown } {
  const score = clamp(0, 100, raw);
  if (score === raw) return { score, breakdown };
  return { score, breakdown: { ...breakdown, clamp_adjustment: roundTo(score - raw, 4) } };
}

/**
 * Prices above the category reference score above `center`, cheaper ones
 * below it, scaled by `slope` per 100% of price difference.
 */
export const priceRatioFallback: FallbackStrategy = (price, category, params) => {
  const ratio = (price - category.reference_price) / category.reference_price;
  const priceTerm = ratio * params.slope;
  const { score, breakdown } = withClampAdjustment(
    { fallback_center: params.center, price_ratio: roundTo(priceTerm, 4) },
    params.center + priceTerm,
  );
  return { baseline: score, breakdown };
};

export function scoreKnownBrand(
  brand: BrandProfile,
  category: CategoryProfile,
  weights: ScoringConfig['weights'],
): { quality_score: number; breakdown: Breakdown } {
  const adjustment = brand.category_overrides[category.item_type] ?? 0;
  const durability = weights.durability * brand.durability_rating;
  const transparency = weights.transparency * brand.transparency_score;
  const raw = brand.quality_baseline + adjustment + durability + transparency;

  const { score, breakdown } = withClampAdjustment(
    {
      quality_baseline: brand.quality_baseline,
      category_adjustment: adjustment,
      durability: roundTo(durability, 4),
      transparency: roundTo(transparency, 4),
    },
    raw,
  );
  return { quality_score: Math.round(score), breakdown };
}

export type ScoreInput = {
  brand: string;
  category: CategoryProfile;
  price: number;
};

export function scoreItem(
  input: ScoreInput,
  catalog: CatalogStore,
  config: ScoringConfig,
  fallback: FallbackStrategy = priceRatioFallback,
): ScoreResult {
  const profile = catalog.lookupBrand(input.brand);

  if (profile) {
    const known = scoreKnownBrand(profile, input.category, config.weights);
    return { ...known, fallback_used: false, brand_name: profile.name, brand_baseline: profile.quality_baseline };
  }

  const estimate = fallback(input.price, input.category, config.fallback);
  return {
    quality_score: Math.round(clamp(0, 100, estimate.baseline)),
    fallback_used: true,
    breakdown: estimate.breakdown,
    brand_name: input.brand,
    brand_baseline: null,
  };
}
