import { AnalysisError } from '../../common/errors';
import type { CatalogStore } from '../../types/catalog';
import type { RawAnalysisInput, ValidatedRequest } from '../../types/analysis';

function parsePrice(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new AnalysisError('InvalidPrice', 'price must be a number greater than 0');
  }
  return value;
}

/**
 * Normalizes a raw request against the catalog.
 * Categories are a closed set and must resolve; brands are open and pass
 * through unresolved so the scorer can fall back.
 */
export function validateAnalysisRequest(input: RawAnalysisInput, catalog: CatalogStore): ValidatedRequest {
  const brand = typeof input.brand === 'string' ? input.brand.trim().replace(/\s+/g, ' ') : '';
  if (!brand) {
    throw new AnalysisError('MissingBrand', 'brand is required');
  }

  const price = parsePrice(input.price);

  const itemType = typeof input.item_type === 'string' ? input.item_type : '';
  const category = itemType ? catalog.lookupCategory(itemType) : undefined;
  if (!category) {
    throw new AnalysisError('UnknownCategory', `Unknown item_type '${itemType}'`);
  }

  return {
    brand,
    item_type: category.item_type,
    price,
    category,
  };
}
