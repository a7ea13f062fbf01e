import fs from 'fs';
import { scoringConfigDoc } from '../../schemas/scoring.schemas';
import { ScoringConfigError } from '../../common/errors';

export type VerdictBand = {
  min_score: number;
  verdict: string;
};

export type ScoringConfig = {
  version: string;
  weights: {
    durability: number;                     // w_d, applied to durability_rating (0..100)
    transparency: number;                   // w_t, applied to transparency_score (0..100)
  };
  multiplier: { min: number; max: number }; // wear multiplier at score 0 and score 100
  fallback: { center: number; slope: number };
  verdict_bands: VerdictBand[];             // sorted by min_score descending
  alternatives: { min_score_gain: number; limit: number };
  benchmarks: { category_margin: number };  // distance from the category mean that counts as above/below
};

export function parseScoringConfig(raw: unknown): ScoringConfig {
  const parsed = scoringConfigDoc.safeParse(raw);
  if (!parsed.success) {
    throw new ScoringConfigError('Scoring config is malformed', parsed.error.flatten());
  }
  const c = parsed.data;
  return {
    ...c,
    verdict_bands: [...c.verdict_bands].sort((a, b) => b.min_score - a.min_score),
  };
}

export function loadScoringConfigFromFile(absoluteJsonPath: string): ScoringConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absoluteJsonPath, 'utf8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ScoringConfigError(`Cannot read scoring config at ${absoluteJsonPath}: ${reason}`);
  }
  return parseScoringConfig(raw);
}
