import fs from 'fs';
import { catalogDoc, type CatalogDoc } from '../schemas/catalog.schemas';
import { CatalogLoadError } from '../common/errors';
import { compareNames, normalizeKey } from '../common/text.util';
import type {
  BrandProfile,
  CatalogStore,
  CategoryProfile,
  PriceTier,
  PriceTierInfo,
} from '../types/catalog';

class StaticCatalogStore implements CatalogStore {
  constructor(
    readonly version: string,
    private readonly brandsByKey: ReadonlyMap<string, BrandProfile>,
    private readonly categoriesByKey: ReadonlyMap<string, CategoryProfile>,
    private readonly sortedBrands: readonly BrandProfile[],
    private readonly sortedCategories: readonly CategoryProfile[],
    private readonly tiers: Readonly<Record<PriceTier, PriceTierInfo>>,
  ) {}

  lookupBrand(name: string) {
    return this.brandsByKey.get(normalizeKey(name));
  }

  lookupCategory(itemType: string) {
    return this.categoriesByKey.get(normalizeKey(itemType));
  }

  listCategories() {
    return this.sortedCategories;
  }

  listBrands() {
    return this.sortedBrands;
  }

  priceRange(tier: PriceTier) {
    return this.tiers[tier].typical_price_range;
  }
}

function buildCategories(doc: CatalogDoc): Map<string, CategoryProfile> {
  const byKey = new Map<string, CategoryProfile>();
  for (const c of doc.categories) {
    const key = normalizeKey(c.item_type);
    if (byKey.has(key)) {
      throw new CatalogLoadError(`Duplicate category '${c.item_type}'`);
    }
    byKey.set(
      key,
      Object.freeze({
        item_type: key,
        base_wear_count: c.base_wear_count,
        reference_price: c.reference_price,
        ...(c.base_lifespan_months !== undefined ? { base_lifespan_months: c.base_lifespan_months } : {}),
      }),
    );
  }
  return byKey;
}

function buildBrands(doc: CatalogDoc, categories: ReadonlyMap<string, CategoryProfile>) {
  const byKey = new Map<string, BrandProfile>();
  const brands: BrandProfile[] = [];

  for (const b of doc.brands) {
    const overrides: Record<string, number> = {};
    for (const [cat, adjustment] of Object.entries(b.category_overrides)) {
      const catKey = normalizeKey(cat);
      if (!categories.has(catKey)) {
        throw new CatalogLoadError(`Brand '${b.name}' overrides unknown category '${cat}'`);
      }
      overrides[catKey] = adjustment;
    }

    const profile: BrandProfile = Object.freeze({
      name: b.name.trim(),
      aliases: Object.freeze([...b.aliases]),
      description: b.description ?? null,
      quality_baseline: b.quality_baseline,
      durability_rating: b.durability_rating,
      transparency_score: b.transparency_score,
      price_tier: b.price_tier,
      category_overrides: Object.freeze(overrides),
    });

    for (const label of [b.name, ...b.aliases]) {
      const key = normalizeKey(label);
      const existing = byKey.get(key);
      if (existing && existing !== profile) {
        throw new CatalogLoadError(`Brand key '${key}' is claimed by both '${existing.name}' and '${b.name}'`);
      }
      byKey.set(key, profile);
    }
    brands.push(profile);
  }

  brands.sort((x, y) => compareNames(x.name, y.name));
  return { byKey, brands };
}

/**
 * Validates a raw catalog document and builds an immutable store from it.
 * Throws CatalogLoadError on the first structural or referential problem.
 */
export function createCatalogStore(raw: unknown): CatalogStore {
  const parsed = catalogDoc.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogLoadError('Catalog document is malformed', parsed.error.flatten());
  }
  const doc = parsed.data;

  const categories = buildCategories(doc);
  const { byKey, brands } = buildBrands(doc, categories);
  const sortedCategories = [...categories.values()].sort((a, b) =>
    a.item_type < b.item_type ? -1 : a.item_type > b.item_type ? 1 : 0,
  );

  return new StaticCatalogStore(
    doc.version,
    byKey,
    categories,
    Object.freeze(brands),
    Object.freeze(sortedCategories),
    Object.freeze({ ...doc.price_tiers }),
  );
}

export function loadCatalogFromFile(absoluteJsonPath: string): CatalogStore {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absoluteJsonPath, 'utf8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new CatalogLoadError(`Cannot read catalog at ${absoluteJsonPath}: ${reason}`);
  }
  return createCatalogStore(raw);
}
