import { Router } from 'express';
import * as ctrl from '../controllers/analysis.controller';
import { validate } from '../middlewares/validate';
import { asyncHandler } from '../middlewares/asyncHandler';
import { analyzeBody, compareBody } from '../schemas/analysis.schemas';

const r = Router();

/**
 * POST /analyze
 * Body: { brand, item_type, price }
 */
r.post('/analyze', validate(analyzeBody), asyncHandler(ctrl.analyze));

/**
 * POST /compare
 * Body: { item_type, price, brands: string[] }
 * - Ranked by cost per wear; per-brand failures are listed under `failed`
 */
r.post('/compare', validate(compareBody), asyncHandler(ctrl.compare));

export default r;
