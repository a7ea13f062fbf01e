import path from 'path';
import { describe, it, expect } from 'vitest';
import { analyzeItem, evaluateItem, runPipeline, type ScoringContext } from './analysis.pipeline';
import { loadScoringConfigFromFile } from './scoring.config';
import { loadCatalogFromFile } from '../../repos/catalog.repo';
import { AnalysisError } from '../../common/errors';

const ctx: ScoringContext = {
  catalog: loadCatalogFromFile(path.join(process.cwd(), 'data', 'catalog', 'catalog@1.0.0.json')),
  config: loadScoringConfigFromFile(path.join(process.cwd(), 'data', 'scoring', 'scoring@1.0.0.json')),
};

describe('analyzeItem', () => {
  it('produces a full result for a catalog brand', () => {
    expect(analyzeItem({ brand: 'Patagonia', item_type: 'jeans', price: 49.99 }, ctx)).toEqual({
      brand: 'Patagonia',
      item_type: 'jeans',
      price: 49.99,
      quality_score: 93,
      estimated_wears: 190,
      estimated_lifespan_months: 45,
      cost_per_wear: 0.26,
      verdict: 'excellent value potential',
      fallback_used: false,
      brand_baseline: 80,
      breakdown: { quality_baseline: 80, category_adjustment: 0, durability: 8.5, transparency: 4.5 },
    });
  });

  it('falls back for an unknown brand', () => {
    expect(analyzeItem({ brand: 'NoName', item_type: 'Jeans', price: 49.99 }, ctx)).toEqual({
      brand: 'NoName',
      item_type: 'jeans',
      price: 49.99,
      quality_score: 40,
      estimated_wears: 110,
      estimated_lifespan_months: 26,
      cost_per_wear: 0.45,
      verdict: 'reconsider',
      fallback_used: true,
      brand_baseline: null,
      breakdown: { fallback_center: 40, price_ratio: -0.004 },
    });
  });

  it('gives the catalog brand the lower cost per wear at equal price', () => {
    const known = analyzeItem({ brand: 'Patagonia', item_type: 'jeans', price: 49.99 }, ctx);
    const unknown = analyzeItem({ brand: 'NoName', item_type: 'jeans', price: 49.99 }, ctx);
    expect(known.cost_per_wear).toBeLessThan(unknown.cost_per_wear);
  });

  it('keeps every result in range across the catalog', () => {
    const brands = [...ctx.catalog.listBrands().map((b) => b.name), 'NoName'];
    for (const category of ctx.catalog.listCategories()) {
      for (const brand of brands) {
        for (const price of [0.01, 9.99, category.reference_price, 1000]) {
          const res = analyzeItem({ brand, item_type: category.item_type, price }, ctx);
          expect(res.quality_score).toBeGreaterThanOrEqual(0);
          expect(res.quality_score).toBeLessThanOrEqual(100);
          expect(Number.isInteger(res.quality_score)).toBe(true);
          expect(res.estimated_wears).toBeGreaterThanOrEqual(1);
          expect(res.cost_per_wear).toBe(Math.round((price / res.estimated_wears) * 100) / 100);
        }
      }
    }
  });

  it('returns a finite cost per wear for the largest prices', () => {
    const res = analyzeItem({ brand: 'Shein', item_type: 'jeans', price: 1.7e308 }, ctx);
    expect(res.estimated_wears).toBe(70);
    expect(res.cost_per_wear).toBe(1.7e308 / 70);
    expect(JSON.parse(JSON.stringify(res)).cost_per_wear).toBe(1.7e308 / 70);
  });

  it('throws AnalysisError on invalid input', () => {
    expect(() => analyzeItem({ brand: 'Zara', item_type: 'socks', price: 10 }, ctx)).toThrow(AnalysisError);
  });
});

describe('evaluateItem', () => {
  it('hands back the resolved category with the result', () => {
    const { request, result } = evaluateItem({ brand: 'Zara', item_type: ' Jeans ', price: 49.99 }, ctx);
    expect(request.category).toBe(ctx.catalog.lookupCategory('jeans'));
    expect(result.item_type).toBe('jeans');
  });
});

describe('runPipeline', () => {
  it('finalizes valid input', () => {
    const outcome = runPipeline({ brand: 'Zara', item_type: 'jeans', price: 49.99 }, ctx);
    expect(outcome.state).toBe('Finalized');
  });

  it('ends in Failed with the error kind', () => {
    const input = { brand: 'Zara', item_type: 'jeans', price: -1 };
    expect(runPipeline(input, ctx)).toEqual({
      state: 'Failed',
      input,
      error_kind: 'InvalidPrice',
      message: 'price must be a number greater than 0',
    });
  });
});
