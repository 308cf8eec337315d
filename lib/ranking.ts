/**
 * Weekend destination ranking
 *
 * One pass per source city: resolve the source state, drop same-city
 * records, score the rest, sort deterministically and keep the top N.
 */

import { type AdjacencyTable, STATE_ADJACENCY } from './adjacency';
import { DEFAULT_WEEKEND_CONFIG, type WeekendConfig } from './config';
import { medianRating, normalizeKey } from './normalize';
import { scoreDestination, type ScoringContext } from './scoring';
import type { DestinationRecord, RankedDestination, RankingResult } from './types';

// Scores closer than this are treated as equal
export const SCORE_EPSILON = 1e-9;

export class SourceCityNotFoundError extends Error {
  readonly code = 'SOURCE_CITY_NOT_FOUND';
  readonly city: string;

  constructor(city: string) {
    super(`City '${city}' not found in dataset`);
    this.name = 'SourceCityNotFoundError';
    this.city = city;
  }
}

export interface RankOptions {
  config?: WeekendConfig;
  table?: AdjacencyTable;
  topN?: number;
}

/**
 * State of the first record in the given city.
 * Throws SourceCityNotFoundError when no record matches.
 */
export function resolveSourceState(records: readonly DestinationRecord[], city: string): string {
  const key = normalizeKey(city);
  const match = key ? records.find((record) => normalizeKey(record.city) === key) : undefined;
  if (!match) {
    throw new SourceCityNotFoundError(city);
  }
  return match.state;
}

/**
 * Rating substituted for missing or malformed ratings in this pass.
 */
export function resolveImputedRating(records: readonly DestinationRecord[], config: WeekendConfig): number {
  if (typeof config.imputedRating === 'number') return config.imputedRating;

  const median = medianRating(records.map((record) => record.rating));
  return median ?? (config.ratingScale.min + config.ratingScale.max) / 2;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Composite descending, then rating score descending, then name and city
 * ascending by code unit.
 */
export function compareRanked(a: RankedDestination, b: RankedDestination): number {
  const composite = b.breakdown.compositeScore - a.breakdown.compositeScore;
  if (Math.abs(composite) > SCORE_EPSILON) return composite;

  const rating = b.breakdown.ratingScore - a.breakdown.ratingScore;
  if (Math.abs(rating) > SCORE_EPSILON) return rating;

  return compareText(a.record.name, b.record.name) || compareText(a.record.city, b.record.city);
}

export function rankDestinations(
  records: readonly DestinationRecord[],
  sourceCity: string,
  options: RankOptions = {}
): RankingResult {
  const config = options.config ?? DEFAULT_WEEKEND_CONFIG;
  const topN = options.topN ?? config.topN;
  if (!Number.isInteger(topN) || topN < 1) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }

  // STEP 1: Source state (the one hard failure)
  const sourceState = resolveSourceState(records, sourceCity);

  // STEP 2: Never recommend the city we are leaving from
  const cityKey = normalizeKey(sourceCity);
  const candidates = records.filter((record) => normalizeKey(record.city) !== cityKey);

  // STEP 3: Score
  const context: ScoringContext = {
    config,
    table: options.table ?? STATE_ADJACENCY,
    imputedRating: resolveImputedRating(records, config),
  };
  const source = { city: sourceCity, state: sourceState };
  const scored: RankedDestination[] = candidates.map((record) => ({
    record,
    breakdown: scoreDestination(record, source, context),
  }));

  // STEP 4: Sort and truncate
  scored.sort(compareRanked);

  return {
    sourceCity,
    sourceState,
    destinations: scored.slice(0, topN),
    candidateCount: candidates.length,
    excludedSameCity: records.length - candidates.length,
  };
}

export function logRankingDebug(result: RankingResult): void {
  console.log(`[Ranking] Source: ${result.sourceCity}, ${result.sourceState || 'unknown state'}`);
  console.log(`[Ranking] Candidates: ${result.candidateCount}, same-city excluded: ${result.excludedSameCity}`);
  result.destinations.forEach((entry, i) => {
    const { compositeScore, proximityTier } = entry.breakdown;
    console.log(`  ${i + 1}. ${entry.record.name} (${compositeScore.toFixed(3)}, ${proximityTier})`);
  });
}
