import { Router } from 'express';
import health from './health.routes';
import analysis from './analysis.routes';
import brands from './brands.routes';
import categories from './categories.routes';

export const routes = Router();
routes.use('/health', health);
routes.use('/', analysis);
routes.use('/brands', brands);
routes.use('/categories', categories);
