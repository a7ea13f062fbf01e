import { roundTo } from '../../common/text.util';
import type { CatalogStore, CategoryProfile } from '../../types/catalog';
import type { CategoryPosition, CategoryStanding } from '../../types/analysis';
import type { ScoringConfig } from './scoring.config';
import { scoreKnownBrand } from './quality.scorer';

/**
 * Places a score against the mean known-brand score for the category.
 * Within `category_margin` of the mean is 'average'.
 */
export function categoryStanding(
  category: CategoryProfile,
  score: number,
  catalog: CatalogStore,
  config: ScoringConfig,
): CategoryStanding {
  const brands = catalog.listBrands();
  if (brands.length === 0) {
    return { category_average: null, category_position: null };
  }

  let total = 0;
  for (const profile of brands) {
    total += scoreKnownBrand(profile, category, config.weights).quality_score;
  }
  const average = roundTo(total / brands.length, 1);
  const margin = config.benchmarks.category_margin;

  let position: CategoryPosition = 'average';
  if (score >= average + margin) position = 'above';
  else if (score <= average - margin) position = 'below';

  return { category_average: average, category_position: position };
}
