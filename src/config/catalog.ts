import { env } from './env';
import { logger } from './logger';
import { loadCatalogFromFile } from '../repos/catalog.repo';
import type { CatalogStore } from '../types/catalog';

let catalog: CatalogStore | null = null;

export function getCatalog(): CatalogStore {
  if (catalog) return catalog;
  catalog = loadCatalogFromFile(env.CATALOG_PATH);
  logger.info(
    { version: catalog.version, brands: catalog.listBrands().length, categories: catalog.listCategories().length },
    'Catalog loaded',
  );
  return catalog;
}

/**
 * Builds a complete new store, then swaps the reference in one assignment.
 * If the build throws, the current catalog stays in place.
 */
export function reloadCatalog(absoluteJsonPath: string = env.CATALOG_PATH): CatalogStore {
  const next = loadCatalogFromFile(absoluteJsonPath);
  catalog = next;
  logger.info({ version: next.version, path: absoluteJsonPath }, 'Catalog reloaded');
  return next;
}
