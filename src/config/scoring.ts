import { env } from './env';
import { logger } from './logger';
import { loadScoringConfigFromFile, type ScoringConfig } from '../services/scoring/scoring.config';

let config: ScoringConfig | null = null;

export function getScoringConfig(): ScoringConfig {
  if (config) return config;
  config = loadScoringConfigFromFile(env.SCORING_CONFIG_PATH);
  logger.info({ version: config.version }, 'Scoring config loaded');
  return config;
}
