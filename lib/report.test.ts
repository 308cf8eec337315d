import { describe, expect, it } from 'vitest';
import { rankDestinations } from './ranking';
import { assembleReport, formatReportText } from './report';
import { PUNE_DATASET } from './testing/fixtures';
import type { ReportRecord, ScoreBreakdown } from './types';

const RULE = '='.repeat(70);

function breakdown(overrides: Partial<ScoreBreakdown> = {}): ScoreBreakdown {
  return {
    ratingScore: 0.9,
    proximityScore: 0.7,
    categoryScore: 0.9,
    compositeScore: 0.84,
    proximityTier: 'neighbor',
    ratingImputed: false,
    matchedCategoryKeyword: 'fort',
    warnings: [],
    ...overrides,
  };
}

describe('assembleReport', () => {
  it('numbers entries in ranking order and copies record fields', () => {
    const ranking = rankDestinations(PUNE_DATASET, 'Pune', { topN: 2 });
    const report = assembleReport(ranking.sourceCity, ranking.sourceState, ranking);

    expect(report.sourceCity).toBe('Pune');
    expect(report.sourceState).toBe('Maharashtra');
    expect(report.weights).toEqual({ rating: 0.5, proximity: 0.3, category: 0.2 });
    expect(report.entries.map(({ rank, name, city, state, category, rating }) => ({ rank, name, city, state, category, rating }))).toEqual([
      { rank: 1, name: 'Lonavala Lake', city: 'Lonavala', state: 'Maharashtra', category: 'Lake', rating: 4.2 },
      { rank: 2, name: 'Mysore Palace', city: 'Mysore', state: 'Karnataka', category: 'Palace', rating: 4.7 },
    ]);
    expect(report.entries[0].breakdown).toBe(ranking.destinations[0].breakdown);
  });
});

describe('formatReportText', () => {
  it('renders a section per destination with its breakdown', () => {
    const report: ReportRecord = {
      sourceCity: 'Delhi',
      sourceState: 'Delhi',
      weights: { rating: 0.5, proximity: 0.3, category: 0.2 },
      entries: [
        { rank: 1, name: 'Amber Fort', city: 'Jaipur', state: 'Rajasthan', category: 'Fort', rating: 4.5, breakdown: breakdown() },
      ],
    };

    expect(formatReportText(report).split('\n')).toEqual([
      RULE,
      'TOP 1 WEEKEND GETAWAYS FROM DELHI',
      RULE,
      '',
      'Source: Delhi, Delhi',
      'Ranking based on: Rating (50%), Proximity (30%), Category (20%)',
      '',
      '1. Amber Fort',
      '   Location: Jaipur, Rajasthan',
      '   Category: Fort',
      '   Rating: 4.5',
      '   Weekend Score: 0.840',
      '   (Proximity: 0.7 neighbor, Rating: 0.90, Category: 0.90)',
      '',
    ]);
  });

  it('marks imputed ratings and unknown states', () => {
    const report: ReportRecord = {
      sourceCity: 'Delhi',
      sourceState: '',
      weights: { rating: 0.5, proximity: 0.3, category: 0.2 },
      entries: [
        {
          rank: 1,
          name: 'Abbey Falls',
          city: 'Coorg',
          state: '',
          category: '',
          rating: null,
          breakdown: breakdown({ ratingImputed: true, proximityTier: 'distant', proximityScore: 0.4 }),
        },
      ],
    };

    const lines = formatReportText(report).split('\n');

    expect(lines[4]).toBe('Source: Delhi, Unknown');
    expect(lines[8]).toBe('   Location: Coorg, Unknown');
    expect(lines[9]).toBe('   Category: N/A');
    expect(lines[10]).toBe('   Rating: N/A (imputed)');
    expect(lines[12]).toBe('   (Proximity: 0.4 distant, Rating: 0.90, Category: 0.90)');
  });
});
