import 'dotenv/config';
import path from 'path';

const get = (k: string, d?: string) => process.env[k] ?? d ?? (() => { throw new Error(`Missing env ${k}`) })();

const resolveFromCwd = (p: string) => (path.isAbsolute(p) ? p : path.join(process.cwd(), p));

export const env = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 4001),
  LOG_LEVEL: process.env.LOG_LEVEL ?? 'info',
  CATALOG_PATH: resolveFromCwd(get('CATALOG_PATH', path.join('data', 'catalog', 'catalog@1.0.0.json'))),
  SCORING_CONFIG_PATH: resolveFromCwd(get('SCORING_CONFIG_PATH', path.join('data', 'scoring', 'scoring@1.0.0.json'))),
} as const;
