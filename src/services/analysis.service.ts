import { getCatalog } from '../config/catalog';
import { getScoringConfig } from '../config/scoring';
import { NotFoundError } from '../common/errors';
import { evaluateItem, type ScoringContext } from './scoring/analysis.pipeline';
import { compareBrands } from './scoring/comparison.ranker';
import { findBetterAlternatives } from './scoring/alternatives';
import { categoryStanding } from './scoring/category.standing';
import type { BrandProfile } from '../types/catalog';
import type { AnalysisReport, ComparisonResult, RawAnalysisInput } from '../types/analysis';

// One catalog reference per call, so a reload mid-request is never observed.
function context(): ScoringContext {
  return { catalog: getCatalog(), config: getScoringConfig() };
}

export const analysisService = {
  analyze(input: RawAnalysisInput): AnalysisReport {
    const ctx = context();
    const { request, result } = evaluateItem(input, ctx);

    return {
      ...result,
      ...categoryStanding(request.category, result.quality_score, ctx.catalog, ctx.config),
      better_alternatives: findBetterAlternatives(
        result.brand,
        request.category,
        result.quality_score,
        ctx.catalog,
        ctx.config,
      ),
    };
  },

  compare(q: { item_type?: unknown; price?: unknown; brands: string[] }): ComparisonResult & {
    item_type: string;
    price: number;
  } {
    const requests = q.brands.map((brand) => ({ brand, item_type: q.item_type, price: q.price }));
    const result = compareBrands(requests, context());
    // compareBrands throws unless at least one entry ranked
    const [head] = result.ranked;
    return { item_type: head.item_type, price: head.price, ...result };
  },

  brandProfile(name: string): BrandProfile & { typical_price_range: string } {
    const catalog = getCatalog();
    const profile = catalog.lookupBrand(name);
    if (!profile) {
      throw new NotFoundError(`Brand '${name}' not found`);
    }
    return { ...profile, typical_price_range: catalog.priceRange(profile.price_tier) };
  },

  listBrands() {
    const catalog = getCatalog();
    return catalog.listBrands().map((b) => ({ ...b, typical_price_range: catalog.priceRange(b.price_tier) }));
  },

  listCategories() {
    return getCatalog().listCategories();
  },
};
