import { compareNames, normalizeKey } from '../../common/text.util';
import type { CatalogStore, CategoryProfile } from '../../types/catalog';
import type { Alternative } from '../../types/analysis';
import type { ScoringConfig } from './scoring.config';
import { scoreKnownBrand } from './quality.scorer';

/**
 * Catalog brands that score meaningfully higher than `currentScore` in the
 * same category. The analyzed brand itself is skipped, by any of its names.
 */
export function findBetterAlternatives(
  brand: string,
  category: CategoryProfile,
  currentScore: number,
  catalog: CatalogStore,
  config: ScoringConfig,
): Alternative[] {
  const self = catalog.lookupBrand(brand);
  const selfKey = normalizeKey(brand);
  const { min_score_gain, limit } = config.alternatives;

  const candidates: Alternative[] = [];
  for (const profile of catalog.listBrands()) {
    if (profile === self || normalizeKey(profile.name) === selfKey) continue;

    const { quality_score } = scoreKnownBrand(profile, category, config.weights);
    if (quality_score >= currentScore + min_score_gain) {
      candidates.push({
        brand: profile.name,
        quality_score,
        price_tier: profile.price_tier,
        typical_price_range: catalog.priceRange(profile.price_tier),
      });
    }
  }

  candidates.sort((a, b) => b.quality_score - a.quality_score || compareNames(a.brand, b.brand));
  return candidates.slice(0, limit);
}
