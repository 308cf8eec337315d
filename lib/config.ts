/**
 * Scoring configuration.
 *
 * Defaults reproduce the published weekend reports; overrides are validated
 * against the same invariants before any ranking runs.
 */

import { z } from 'zod';
import type { CategoryRule, RatingScale } from './normalize';
import type { ProximityTier } from './types';

export interface CompositeWeights {
  rating: number;
  proximity: number;
  category: number;
}

export type TierWeights = Record<ProximityTier, number>;

export interface WeekendConfig {
  weights: CompositeWeights;
  tierWeights: TierWeights;
  categoryRules: readonly CategoryRule[];
  defaultCategoryWeight: number;
  ratingScale: RatingScale;
  // 'median' imputes the dataset median; a number is used as-is
  imputedRating: number | 'median';
  topN: number;
}

const WEIGHT_SUM_TOLERANCE = 1e-9;

// Rating dominates: a well-reviewed place is worth a longer drive
export const COMPOSITE_WEIGHTS: Readonly<CompositeWeights> = Object.freeze({
  rating: 0.5,
  proximity: 0.3,
  category: 0.2,
});

// Same state is an easy drive, a neighboring state is still a weekend,
// anything further is possible but not ideal
export const TIER_WEIGHTS: Readonly<TierWeights> = Object.freeze({
  same: 1.0,
  neighbor: 0.7,
  distant: 0.4,
});

// Weekend-friendly destination types, in priority order
export const CATEGORY_RULES: readonly CategoryRule[] = Object.freeze([
  { keyword: 'hill station', weight: 1.0 },
  { keyword: 'hill', weight: 1.0 },
  { keyword: 'beach', weight: 1.0 },
  { keyword: 'lake', weight: 0.95 },
  { keyword: 'nature', weight: 0.95 },
  { keyword: 'historical', weight: 0.9 },
  { keyword: 'fort', weight: 0.9 },
  { keyword: 'palace', weight: 0.9 },
  { keyword: 'religious', weight: 0.9 },
  { keyword: 'adventure', weight: 0.85 },
  { keyword: 'temple', weight: 0.85 },
  { keyword: 'wildlife', weight: 0.8 },
  { keyword: 'sanctuary', weight: 0.8 },
]);

export const DEFAULT_CATEGORY_WEIGHT = 0.6;
export const DEFAULT_TOP_N = 5;

export const DEFAULT_WEEKEND_CONFIG: Readonly<WeekendConfig> = Object.freeze({
  weights: COMPOSITE_WEIGHTS,
  tierWeights: TIER_WEIGHTS,
  categoryRules: CATEGORY_RULES,
  defaultCategoryWeight: DEFAULT_CATEGORY_WEIGHT,
  ratingScale: Object.freeze({ min: 0, max: 5 }),
  imputedRating: 'median',
  topN: DEFAULT_TOP_N,
});

const unit = z.number().min(0).max(1);

const CompositeWeightsSchema = z
  .object({ rating: unit, proximity: unit, category: unit })
  .refine(
    (w) => Math.abs(w.rating + w.proximity + w.category - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'composite weights must sum to 1' }
  );

const TierWeightsSchema = z
  .object({ same: unit, neighbor: unit, distant: unit })
  .refine((t) => t.same > t.neighbor && t.neighbor > t.distant, {
    message: 'tier weights must satisfy same > neighbor > distant',
  });

const RatingScaleSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((s) => s.max > s.min, { message: 'rating scale max must exceed min' });

export const WeekendConfigSchema = z.object({
  weights: CompositeWeightsSchema,
  tierWeights: TierWeightsSchema,
  categoryRules: z.array(z.object({ keyword: z.string().trim().min(1), weight: unit })),
  defaultCategoryWeight: unit,
  ratingScale: RatingScaleSchema,
  imputedRating: z.union([z.number(), z.literal('median')]),
  topN: z.number().int().min(1),
});

// Overrides accepted from callers (API bodies, tests)
export const WeekendConfigOverridesSchema = z.object({
  weights: z.object({ rating: unit, proximity: unit, category: unit }).partial().optional(),
  tierWeights: z.object({ same: unit, neighbor: unit, distant: unit }).partial().optional(),
  categoryRules: z.array(z.object({ keyword: z.string(), weight: z.number() })).optional(),
  defaultCategoryWeight: z.number().optional(),
  ratingScale: z.object({ min: z.number(), max: z.number() }).partial().optional(),
  imputedRating: z.union([z.number(), z.literal('median')]).optional(),
  topN: z.number().optional(),
});

export type WeekendConfigOverrides = z.infer<typeof WeekendConfigOverridesSchema>;

export class InvalidWeekendConfigError extends Error {
  readonly code = 'INVALID_WEEKEND_CONFIG';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid weekend config: ${issues.join('; ')}`);
    this.name = 'InvalidWeekendConfigError';
    this.issues = issues;
  }
}

/**
 * Merge overrides over the defaults and validate the result.
 */
export function resolveWeekendConfig(overrides: WeekendConfigOverrides = {}): WeekendConfig {
  const base = DEFAULT_WEEKEND_CONFIG;
  const merged = {
    weights: { ...base.weights, ...overrides.weights },
    tierWeights: { ...base.tierWeights, ...overrides.tierWeights },
    categoryRules: overrides.categoryRules ?? base.categoryRules.map((rule) => ({ ...rule })),
    defaultCategoryWeight: overrides.defaultCategoryWeight ?? base.defaultCategoryWeight,
    ratingScale: { ...base.ratingScale, ...overrides.ratingScale },
    imputedRating: overrides.imputedRating ?? base.imputedRating,
    topN: overrides.topN ?? base.topN,
  };

  const parsed = WeekendConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidWeekendConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
