import { clamp, roundTo } from '../../common/text.util';
import type { CategoryProfile } from '../../types/catalog';
import type { WearEstimate } from '../../types/analysis';
import type { ScoringConfig, VerdictBand } from './scoring.config';

// Multiplier scaled by 100, so integer scores against the default range stay
// exact and base * percent / 100 lands on exact halves.
function multiplierPercent(score: number, range: ScoringConfig['multiplier']): number {
  const s = clamp(0, 100, score);
  return range.min * 100 + (range.max - range.min) * s;
}

/** Linear map from score 0..100 onto [min, max]. */
export function qualityMultiplier(score: number, range: ScoringConfig['multiplier']): number {
  return multiplierPercent(score, range) / 100;
}

function scaleBaseline(base: number, score: number, range: ScoringConfig['multiplier']): number {
  return (base * multiplierPercent(score, range)) / 100;
}

export function costPerWear(price: number, estimatedWears: number): number {
  return roundTo(price / estimatedWears, 2);
}

export function estimateWears(
  category: CategoryProfile,
  qualityScore: number,
  price: number,
  range: ScoringConfig['multiplier'],
): WearEstimate {
  const estimated_wears = Math.max(1, Math.round(scaleBaseline(category.base_wear_count, qualityScore, range)));
  const estimated_lifespan_months =
    category.base_lifespan_months !== undefined
      ? Math.max(1, Math.round(scaleBaseline(category.base_lifespan_months, qualityScore, range)))
      : null;

  return {
    estimated_wears,
    estimated_lifespan_months,
    cost_per_wear: costPerWear(price, estimated_wears),
  };
}

/** bands must be sorted by min_score descending. */
export function verdictFor(qualityScore: number, bands: readonly VerdictBand[]): string {
  for (const band of bands) {
    if (qualityScore >= band.min_score) return band.verdict;
  }
  return bands[bands.length - 1]?.verdict ?? '';
}
