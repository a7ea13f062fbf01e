import { Router } from 'express';
import { getCatalog } from '../config/catalog';

const r = Router();

r.get('/', (_req, res) => {
  const catalog = getCatalog();
  res.json({
    ok: true,
    catalog: {
      version: catalog.version,
      brands: catalog.listBrands().length,
      categories: catalog.listCategories().length,
    },
  });
});

export default r;
