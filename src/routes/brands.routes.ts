import { Router } from 'express';
import * as ctrl from '../controllers/catalog.controller';
import { validate } from '../middlewares/validate';
import { asyncHandler } from '../middlewares/asyncHandler';
import { brandNameParams } from '../schemas/analysis.schemas';

const r = Router();

r.get('/', asyncHandler(ctrl.listBrands));
r.get('/:name', validate(brandNameParams, 'params'), asyncHandler(ctrl.brandDetail));

export default r;
