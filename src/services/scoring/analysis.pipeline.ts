import { AnalysisError } from '../../common/errors';
import type { CatalogStore } from '../../types/catalog';
import type { AnalysisResult, PipelineOutcome, RawAnalysisInput, ValidatedRequest } from '../../types/analysis';
import type { ScoringConfig } from './scoring.config';
import { validateAnalysisRequest } from './request.validator';
import { priceRatioFallback, scoreItem, type FallbackStrategy } from './quality.scorer';
import { estimateWears, verdictFor } from './wear.estimator';

export type ScoringContext = {
  catalog: CatalogStore;
  config: ScoringConfig;
  fallback?: FallbackStrategy;
};

/**
 * Received -> Validated -> Scored -> Estimated -> Finalized.
 * Throws AnalysisError when validation rejects the input. The validated
 * request comes back with the result so callers can reuse its category.
 */
export function evaluateItem(
  input: RawAnalysisInput,
  ctx: ScoringContext,
): { request: ValidatedRequest; result: AnalysisResult } {
  const request = validateAnalysisRequest(input, ctx.catalog);

  const scored = scoreItem(
    { brand: request.brand, category: request.category, price: request.price },
    ctx.catalog,
    ctx.config,
    ctx.fallback ?? priceRatioFallback,
  );

  const wear = estimateWears(request.category, scored.quality_score, request.price, ctx.config.multiplier);

  const result: AnalysisResult = {
    brand: scored.brand_name,
    item_type: request.item_type,
    price: request.price,
    quality_score: scored.quality_score,
    estimated_wears: wear.estimated_wears,
    estimated_lifespan_months: wear.estimated_lifespan_months,
    cost_per_wear: wear.cost_per_wear,
    verdict: verdictFor(scored.quality_score, ctx.config.verdict_bands),
    fallback_used: scored.fallback_used,
    brand_baseline: scored.brand_baseline,
    breakdown: scored.breakdown,
  };
  return { request, result };
}

export function analyzeItem(input: RawAnalysisInput, ctx: ScoringContext): AnalysisResult {
  return evaluateItem(input, ctx).result;
}

/** Same pipeline, with a validation failure as a terminal outcome instead of a throw. */
export function runPipeline(input: RawAnalysisInput, ctx: ScoringContext): PipelineOutcome {
  try {
    return { state: 'Finalized', input, result: analyzeItem(input, ctx) };
  } catch (e) {
    if (e instanceof AnalysisError) {
      return { state: 'Failed', input, error_kind: e.kind, message: e.message };
    }
    throw e;
  }
}
