/**
 * Weekend suitability scoring
 *
 * Combines rating, state proximity and category fit into one composite
 * score per destination, keeping every component for the report.
 */

import { type AdjacencyTable, STATE_ADJACENCY } from './adjacency';
import { type CompositeWeights, DEFAULT_WEEKEND_CONFIG, type WeekendConfig } from './config';
import { clamp01, normalizeCategory, normalizeKey, normalizeRating } from './normalize';
import { classifyProximity } from './proximity';
import type { DestinationRecord, RecordWarning, ScoreBreakdown } from './types';

// =============================================================================
// TYPES
// =============================================================================

export interface ScoringSource {
  city: string;
  state: string;
}

export interface ScoringContext {
  config: WeekendConfig;
  table: AdjacencyTable;
  // Rating used for records whose own rating is missing or malformed
  imputedRating: number;
}

// =============================================================================
// SCORING FUNCTIONS
// =============================================================================

/**
 * Weighted sum of the three sub-scores, clamped to [0, 1].
 */
export function compositeScore(
  parts: { ratingScore: number; proximityScore: number; categoryScore: number },
  weights: CompositeWeights
): number {
  return clamp01(
    weights.rating * parts.ratingScore +
    weights.proximity * parts.proximityScore +
    weights.category * parts.categoryScore
  );
}

export function defaultScoringContext(config: WeekendConfig = DEFAULT_WEEKEND_CONFIG): ScoringContext {
  const { min, max } = config.ratingScale;
  return {
    config,
    table: STATE_ADJACENCY,
    imputedRating: typeof config.imputedRating === 'number' ? config.imputedRating : (min + max) / 2,
  };
}

/**
 * Score a single destination against the source city.
 * The returned breakdown and its warnings are frozen.
 */
export function scoreDestination(
  record: DestinationRecord,
  source: ScoringSource,
  context: ScoringContext = defaultScoringContext()
): Readonly<ScoreBreakdown> {
  const { config, table } = context;
  const warnings: RecordWarning[] = [];

  const rating = normalizeRating(record.rating, {
    scale: config.ratingScale,
    imputedRating: context.imputedRating,
  });
  warnings.push(...rating.warnings);

  if (!normalizeKey(record.state)) {
    warnings.push({ code: 'UNKNOWN_STATE', message: 'State missing; treated as distant' });
  }
  const proximity = classifyProximity(source.state, record.state, {
    table,
    tierWeights: config.tierWeights,
  });

  const category = normalizeCategory(record.category, {
    rules: config.categoryRules,
    defaultWeight: config.defaultCategoryWeight,
  });
  warnings.push(...category.warnings);

  const parts = {
    ratingScore: rating.score,
    proximityScore: clamp01(proximity.weight),
    categoryScore: category.score,
  };

  return Object.freeze({
    ...parts,
    compositeScore: compositeScore(parts, config.weights),
    proximityTier: proximity.tier,
    ratingImputed: rating.imputed,
    matchedCategoryKeyword: category.keyword,
    warnings: Object.freeze([...warnings]),
  });
}
