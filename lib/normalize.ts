/**
 * Field normalization for destination records.
 *
 * Turns free-text ratings and category labels into sub-scores in [0, 1].
 * Nothing here rejects a record: bad input falls back to a default and is
 * reported as a warning instead.
 */

import type { RecordWarning } from './types';

export interface RatingScale {
  min: number;
  max: number;
}

export interface CategoryRule {
  keyword: string;
  weight: number;
}

export interface RatingScore {
  score: number;
  value: number;      // rating actually used (parsed or imputed)
  imputed: boolean;
  warnings: RecordWarning[];
}

export interface CategoryScore {
  score: number;
  keyword: string | null;
  warnings: RecordWarning[];
}

/**
 * Lower-case, trim and collapse whitespace. Every city, state and
 * category comparison goes through this.
 */
export function normalizeKey(raw: string | null | undefined): string {
  if (!raw) return '';
  return raw.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

/**
 * Parse a raw rating. Returns null for anything that is not a finite number.
 */
export function parseRating(raw: number | string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;

  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Scale a rating linearly from the native scale to [0, 1].
 * Missing or malformed ratings are replaced by `imputedRating`.
 */
export function normalizeRating(
  raw: number | string | null | undefined,
  options: { scale: RatingScale; imputedRating: number }
): RatingScore {
  const { scale, imputedRating } = options;
  const warnings: RecordWarning[] = [];
  const parsed = parseRating(raw);

  let value: number;
  let imputed = false;
  if (parsed === null) {
    value = imputedRating;
    imputed = true;
    warnings.push({
      code: 'MISSING_OR_MALFORMED_RATING',
      message: raw === null || raw === undefined || String(raw).trim() === ''
        ? `Rating missing; imputed ${imputedRating}`
        : `Rating "${String(raw)}" is not a number; imputed ${imputedRating}`,
    });
  } else {
    value = parsed;
    if (parsed < scale.min || parsed > scale.max) {
      warnings.push({
        code: 'RATING_OUT_OF_RANGE',
        message: `Rating ${parsed} outside ${scale.min}-${scale.max}; clamped`,
      });
    }
  }

  const span = scale.max - scale.min;
  const score = span > 0 ? clamp01((value - scale.min) / span) : 0.5;

  return { score, value, imputed, warnings };
}

/**
 * Match a category label against keyword rules by containment.
 *
 * The highest-weight matching rule wins; on equal weight the earlier rule
 * wins. Labels matching nothing get `defaultWeight`.
 */
export function normalizeCategory(
  raw: string | null | undefined,
  options: { rules: readonly CategoryRule[]; defaultWeight: number }
): CategoryScore {
  const label = normalizeKey(raw);

  let best: CategoryRule | null = null;
  if (label) {
    for (const rule of options.rules) {
      const keyword = normalizeKey(rule.keyword);
      if (!keyword || !label.includes(keyword)) continue;
      if (!best || rule.weight > best.weight) best = rule;
    }
  }

  if (best) {
    return { score: clamp01(best.weight), keyword: normalizeKey(best.keyword), warnings: [] };
  }

  return {
    score: clamp01(options.defaultWeight),
    keyword: null,
    warnings: [{
      code: 'UNRECOGNIZED_CATEGORY',
      message: label
        ? `Category "${raw ?? ''}" not recognized; default weight ${options.defaultWeight}`
        : `Category missing; default weight ${options.defaultWeight}`,
    }],
  };
}

/**
 * Median of the parseable ratings, or null when none parse.
 */
export function medianRating(ratings: Iterable<number | string | null | undefined>): number | null {
  const values: number[] = [];
  for (const raw of ratings) {
    const parsed = parseRating(raw);
    if (parsed !== null) values.push(parsed);
  }
  if (values.length === 0) return null;

  values.sort((a, b) => a - b);
  const mid = Math.floor(values.length / 2);
  return values.length % 2 === 0 ? (values[mid - 1] + values[mid]) / 2 : values[mid];
}
