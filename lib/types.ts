import { z } from 'zod';

// Raw rating as it comes out of a CSV export or a database column.
// Any other JSON value is treated as missing so the scorer imputes it.
const RawRatingSchema = z
  .unknown()
  .transform((value): number | string | null =>
    typeof value === 'number' || typeof value === 'string' ? value : null
  );

// Optional text field; a non-string value counts as blank
const OptionalTextSchema = z
  .unknown()
  .transform((value): string => (typeof value === 'string' ? value.trim() : ''));

// Destination record as loaded from the dataset (immutable once loaded)
export const DestinationRecordSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  city: z.string().trim().min(1, 'city is required'),
  state: OptionalTextSchema,
  category: OptionalTextSchema,
  rating: RawRatingSchema,
});

export type DestinationRecord = Readonly<z.infer<typeof DestinationRecordSchema>>;

// Proximity tiers, strongest first
export type ProximityTier = 'same' | 'neighbor' | 'distant';

export type WarningCode =
  | 'MISSING_OR_MALFORMED_RATING'
  | 'RATING_OUT_OF_RANGE'
  | 'UNRECOGNIZED_CATEGORY'
  | 'UNKNOWN_STATE';

// Recoverable condition attached to a single scored record
export interface RecordWarning {
  code: WarningCode;
  message: string;
}

export interface ScoreBreakdown {
  ratingScore: number;      // 0-1
  proximityScore: number;   // 0-1, derived from proximityTier
  categoryScore: number;    // 0-1
  compositeScore: number;   // 0-1, weighted sum
  proximityTier: ProximityTier;
  ratingImputed: boolean;
  matchedCategoryKeyword: string | null;
  warnings: readonly RecordWarning[];
}

export interface RankedDestination {
  record: DestinationRecord;
  breakdown: Readonly<ScoreBreakdown>;
}

export interface RankingResult {
  sourceCity: string;
  sourceState: string;
  destinations: RankedDestination[];
  candidateCount: number;     // records left after same-city exclusion
  excludedSameCity: number;
}

// Record excluded from the dataset at load time
export interface DatasetIssue {
  index: number;
  reason: string;
}

export interface ReportEntry {
  rank: number;
  name: string;
  city: string;
  state: string;
  category: string;
  rating: number | string | null;
  breakdown: Readonly<ScoreBreakdown>;
}

export interface ReportRecord {
  sourceCity: string;
  sourceState: string;
  weights: {
    rating: number;
    proximity: number;
    category: number;
  };
  entries: ReportEntry[];
}

// Query accepted by the weekend API
export const WeekendQuerySchema = z.object({
  city: z.string().trim().min(1, 'city is required'),
  top: z.coerce.number().int().min(1).max(50).optional(),
  format: z.enum(['json', 'text']).default('json'),
});
