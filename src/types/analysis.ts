// src/types/analysis.ts
import type { CategoryProfile, PriceTier } from './catalog';

export type AnalysisErrorKind =
  | 'InvalidPrice'
  | 'UnknownCategory'
  | 'MissingBrand';

/** Raw, unvalidated input as it arrives from a caller. */
export interface RawAnalysisInput {
  brand?: unknown;
  item_type?: unknown;
  price?: unknown;
}

export interface AnalysisRequest {
  brand: string;          // trimmed, as submitted
  item_type: string;      // normalized category key
  price: number;
}

export interface ValidatedRequest extends AnalysisRequest {
  category: CategoryProfile;
}

export type Breakdown = Record<string, number>;

export interface ScoreResult {
  quality_score: number;
  fallback_used: boolean;
  breakdown: Breakdown;
  brand_name: string;     // catalog display name, or the submitted name on fallback
  brand_baseline: number | null;
}

export interface WearEstimate {
  estimated_wears: number;
  estimated_lifespan_months: number | null;
  cost_per_wear: number;
}

export interface AnalysisResult {
  brand: string;
  item_type: string;
  price: number;
  quality_score: number;
  estimated_wears: number;
  estimated_lifespan_months: number | null;
  cost_per_wear: number;
  verdict: string;
  fallback_used: boolean;
  brand_baseline: number | null;  // catalog quality_baseline; null on fallback
  breakdown: Breakdown;
}

export interface Alternative {
  brand: string;
  quality_score: number;
  price_tier: PriceTier;
  typical_price_range: string;
}

export type CategoryPosition = 'above' | 'average' | 'below';

export interface CategoryStanding {
  category_average: number | null;       // mean catalog score for the category
  category_position: CategoryPosition | null;
}

export interface AnalysisReport extends AnalysisResult, CategoryStanding {
  better_alternatives: Alternative[];
}

export type PipelineOutcome =
  | { state: 'Finalized'; input: RawAnalysisInput; result: AnalysisResult }
  | { state: 'Failed'; input: RawAnalysisInput; error_kind: AnalysisErrorKind; message: string };

export interface FailedEntry {
  brand: string;
  error_kind: AnalysisErrorKind;
  message: string;
}

export interface ComparisonResult {
  ranked: AnalysisResult[];
  failed: FailedEntry[];
  recommendation: string;
}
