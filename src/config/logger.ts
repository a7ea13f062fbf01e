import pino from 'pino';
import { env } from './env';

export const logger = pino({
  name: 'garment-value-api',
  level: env.LOG_LEVEL,
});
