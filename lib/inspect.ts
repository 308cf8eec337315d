/**
 * Dataset overview: coverage per state, city and category plus rating stats.
 */

import { medianRating, parseRating } from './normalize';
import type { DestinationRecord } from './types';

export interface CountEntry {
  name: string;
  count: number;
}

export interface RatingStats {
  min: number;
  max: number;
  mean: number;
  median: number;
  missing: number;
}

export interface DatasetSummary {
  total: number;
  uniqueStates: number;
  uniqueCities: number;
  uniqueCategories: number;
  topStates: CountEntry[];
  topCities: CountEntry[];
  topCategories: CountEntry[];
  ratings: RatingStats | null;
  cities: CountEntry[];
}

const TOP_LIMIT = 10;

function countBy(records: readonly DestinationRecord[], pick: (r: DestinationRecord) => string): CountEntry[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const key = pick(record).trim();
    if (!key) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([name, count]) => ({ name, count }));
}

function byCountThenName(a: CountEntry, b: CountEntry): number {
  if (a.count !== b.count) return b.count - a.count;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function ratingStats(records: readonly DestinationRecord[]): RatingStats | null {
  const values = records
    .map((record) => parseRating(record.rating))
    .filter((value): value is number => value !== null);
  const median = medianRating(values);
  if (median === null) return null;

  const sum = values.reduce((acc, value) => acc + value, 0);
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean: Math.round((sum / values.length) * 100) / 100,
    median,
    missing: records.length - values.length,
  };
}

export function summarizeDataset(records: readonly DestinationRecord[]): DatasetSummary {
  const states = countBy(records, (r) => r.state).sort(byCountThenName);
  const cities = countBy(records, (r) => r.city);
  const categories = countBy(records, (r) => r.category).sort(byCountThenName);

  return {
    total: records.length,
    uniqueStates: states.length,
    uniqueCities: cities.length,
    uniqueCategories: categories.length,
    topStates: states.slice(0, TOP_LIMIT),
    topCities: [...cities].sort(byCountThenName).slice(0, TOP_LIMIT),
    topCategories: categories.slice(0, TOP_LIMIT),
    ratings: ratingStats(records),
    cities: [...cities].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
  };
}
