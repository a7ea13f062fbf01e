import { Router } from 'express';
import * as ctrl from '../controllers/catalog.controller';
import { asyncHandler } from '../middlewares/asyncHandler';

const r = Router();

r.get('/', asyncHandler(ctrl.listCategories));

export default r;
