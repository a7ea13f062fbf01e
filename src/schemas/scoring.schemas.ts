import { z } from 'zod';

export const scoringConfigDoc = z
  .object({
    version: z.string().min(1),
    weights: z.object({
      durability: z.number().min(0).max(1),
      transparency: z.number().min(0).max(1),
    }),
    multiplier: z.object({
      min: z.number().positive(),
      max: z.number().positive(),
    }),
    fallback: z.object({
      center: z.number().min(0).max(100),
      slope: z.number().min(0),
    }),
    verdict_bands: z
      .array(z.object({ min_score: z.number().min(0).max(100), verdict: z.string().min(1) }))
      .min(1),
    alternatives: z
      .object({
        min_score_gain: z.number().min(0).default(5),
        limit: z.number().int().min(0).max(20).default(3),
      })
      .default({}),
    benchmarks: z
      .object({
        category_margin: z.number().min(0).max(100).default(10),
      })
      .default({}),
  })
  .refine((c) => c.multiplier.max >= c.multiplier.min, {
    message: 'multiplier.max must be >= multiplier.min',
    path: ['multiplier'],
  })
  .refine((c) => c.verdict_bands.some((b) => b.min_score === 0), {
    message: 'verdict_bands must include a band starting at 0',
    path: ['verdict_bands'],
  });

export type ScoringConfigDoc = z.infer<typeof scoringConfigDoc>;
