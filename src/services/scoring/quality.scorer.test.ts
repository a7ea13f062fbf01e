import path from 'path';
import { describe, it, expect } from 'vitest';
import { priceRatioFallback, scoreItem, scoreKnownBrand, type FallbackStrategy } from './quality.scorer';
import { loadScoringConfigFromFile } from './scoring.config';
import { createCatalogStore, loadCatalogFromFile } from '../../repos/catalog.repo';
import type { CategoryProfile } from '../../types/catalog';

const catalog = loadCatalogFromFile(path.join(process.cwd(), 'data', 'catalog', 'catalog@1.0.0.json'));
const config = loadScoringConfigFromFile(path.join(process.cwd(), 'data', 'scoring', 'scoring@1.0.0.json'));
const jeans: CategoryProfile = { item_type: 'jeans', base_wear_count: 100, reference_price: 50 };

describe('scoreItem with a catalog brand', () => {
  it('adds baseline, category adjustment and weighted ratings', () => {
    const res = scoreItem({ brand: 'patagonia', category: jeans, price: 49.99 }, catalog, config);
    expect(res).toEqual({
      quality_score: 93,
      fallback_used: false,
      brand_name: 'Patagonia',
      brand_baseline: 80,
      breakdown: {
        quality_baseline: 80,
        category_adjustment: 0,
        durability: 8.5,
        transparency: 4.5,
      },
    });
  });

  it('applies the category override', () => {
    const res = scoreItem({ brand: 'Zara', category: jeans, price: 49.99 }, catalog, config);
    expect(res.quality_score).toBe(37);
    expect(res.breakdown.category_adjustment).toBe(-3);
  });

  it('ignores price for catalog brands', () => {
    const cheap = scoreItem({ brand: 'Zara', category: jeans, price: 5 }, catalog, config);
    const dear = scoreItem({ brand: 'Zara', category: jeans, price: 500 }, catalog, config);
    expect(cheap.quality_score).toBe(dear.quality_score);
  });
});

describe('scoreKnownBrand clamping', () => {
  const store = createCatalogStore({
    version: 'test',
    price_tiers: {
      budget: { typical_price_range: 'a' },
      mid: { typical_price_range: 'b' },
      premium: { typical_price_range: 'c' },
      luxury: { typical_price_range: 'd' },
    },
    categories: [{ item_type: 'jeans', base_wear_count: 100, reference_price: 50 }],
    brands: [
      {
        name: 'Top',
        quality_baseline: 100,
        durability_rating: 100,
        transparency_score: 100,
        price_tier: 'luxury',
        category_overrides: { jeans: 10 },
      },
      {
        name: 'Bottom',
        quality_baseline: 0,
        durability_rating: 0,
        transparency_score: 0,
        price_tier: 'budget',
        category_overrides: { jeans: -50 },
      },
    ],
  });

  it('caps the score at 100 and records the cut', () => {
    const top = store.lookupBrand('Top');
    expect(top && scoreKnownBrand(top, jeans, config.weights)).toEqual({
      quality_score: 100,
      breakdown: {
        quality_baseline: 100,
        category_adjustment: 10,
        durability: 10,
        transparency: 5,
        clamp_adjustment: -25,
      },
    });
  });

  it('floors the score at 0 and records the lift', () => {
    const bottom = store.lookupBrand('Bottom');
    expect(bottom && scoreKnownBrand(bottom, jeans, config.weights)).toEqual({
      quality_score: 0,
      breakdown: {
        quality_baseline: 0,
        category_adjustment: -50,
        durability: 0,
        transparency: 0,
        clamp_adjustment: 50,
      },
    });
  });

  it('leaves the breakdown unadjusted when the score is in range', () => {
    const patagonia = catalog.lookupBrand('Patagonia');
    expect(patagonia && scoreKnownBrand(patagonia, jeans, config.weights).breakdown).not.toHaveProperty('clamp_adjustment');
  });
});

describe('scoreItem with an unknown brand', () => {
  it('falls back to a neutral 40 near the reference price', () => {
    const res = scoreItem({ brand: 'NoName', category: jeans, price: 49.99 }, catalog, config);
    expect(res).toEqual({
      quality_score: 40,
      fallback_used: true,
      brand_name: 'NoName',
      brand_baseline: null,
      breakdown: { fallback_center: 40, price_ratio: -0.004 },
    });
  });

  it('scores pricier items higher and cheaper items lower', () => {
    expect(scoreItem({ brand: 'NoName', category: jeans, price: 100 }, catalog, config).quality_score).toBe(60);
    expect(scoreItem({ brand: 'NoName', category: jeans, price: 1 }, catalog, config).quality_score).toBe(20);
  });

  it('clamps the fallback into range', () => {
    expect(scoreItem({ brand: 'NoName', category: jeans, price: 300 }, catalog, config)).toMatchObject({
      quality_score: 100,
      breakdown: { fallback_center: 40, price_ratio: 100, clamp_adjustment: -40 },
    });
    const steep = { ...config, fallback: { center: 40, slope: 100 } };
    expect(scoreItem({ brand: 'NoName', category: jeans, price: 1 }, catalog, steep)).toMatchObject({
      quality_score: 0,
      breakdown: { fallback_center: 40, price_ratio: -98, clamp_adjustment: 58 },
    });
  });

  it('keeps the breakdown summing to the clamped score', () => {
    for (const price of [1, 49.99, 300]) {
      const res = scoreItem({ brand: 'NoName', category: jeans, price }, catalog, config);
      const sum = Object.values(res.breakdown).reduce((a, b) => a + b, 0);
      expect(Math.round(sum)).toBe(res.quality_score);
    }
  });

  it('scores a catalog brand above the fallback at the same price', () => {
    const known = scoreItem({ brand: 'Patagonia', category: jeans, price: 49.99 }, catalog, config);
    const unknown = scoreItem({ brand: 'NoName', category: jeans, price: 49.99 }, catalog, config);
    expect(known.quality_score).toBeGreaterThan(unknown.quality_score);
  });

  it('uses a substituted fallback strategy', () => {
    const flat: FallbackStrategy = () => ({ baseline: 55.4, breakdown: { flat: 55.4 } });
    const res = scoreItem({ brand: 'NoName', category: jeans, price: 10 }, catalog, config, flat);
    expect(res.quality_score).toBe(55);
    expect(res.breakdown).toEqual({ flat: 55.4 });
  });
});

describe('priceRatioFallback', () => {
  it('reports the price term it applied', () => {
    expect(priceRatioFallback(75, jeans, { center: 40, slope: 20 })).toEqual({
      baseline: 50,
      breakdown: { fallback_center: 40, price_ratio: 10 },
    });
  });
});
