import { AllComparisonsFailedError } from '../../common/errors';
import { compareNames } from '../../common/text.util';
import type { AnalysisResult, ComparisonResult, FailedEntry, RawAnalysisInput } from '../../types/analysis';
import { runPipeline, type ScoringContext } from './analysis.pipeline';

/** cost_per_wear asc, quality_score desc, brand name asc (case-insensitive). */
export function compareRanked(a: AnalysisResult, b: AnalysisResult): number {
  if (a.cost_per_wear !== b.cost_per_wear) return a.cost_per_wear - b.cost_per_wear;
  if (a.quality_score !== b.quality_score) return b.quality_score - a.quality_score;
  return compareNames(a.brand, b.brand);
}

export function rankResults(results: readonly AnalysisResult[]): AnalysisResult[] {
  return [...results].sort(compareRanked);
}

export function describeRanking(ranked: readonly AnalysisResult[]): string {
  const best = ranked[0];
  const last = ranked[ranked.length - 1];
  if (!best || !last) return '';
  if (ranked.length === 1) return `${best.brand} is the only brand with a result`;

  const improvement = Math.floor((best.estimated_wears / last.estimated_wears - 1) * 100);
  return `${best.brand} has the lowest cost per wear, with ${improvement}% more estimated wears than ${last.brand}`;
}

function brandLabel(input: RawAnalysisInput): string {
  return typeof input.brand === 'string' ? input.brand : '';
}

/**
 * Runs every request independently and ranks the successes.
 * Per-item failures are reported, not propagated, unless nothing succeeded.
 */
export function compareBrands(requests: readonly RawAnalysisInput[], ctx: ScoringContext): ComparisonResult {
  const successes: AnalysisResult[] = [];
  const failed: FailedEntry[] = [];

  for (const input of requests) {
    const outcome = runPipeline(input, ctx);
    if (outcome.state === 'Finalized') {
      successes.push(outcome.result);
    } else {
      failed.push({ brand: brandLabel(input), error_kind: outcome.error_kind, message: outcome.message });
    }
  }

  if (successes.length === 0) {
    throw new AllComparisonsFailedError(failed);
  }

  const ranked = rankResults(successes);
  return { ranked, failed, recommendation: describeRanking(ranked) };
}
