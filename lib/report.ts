import { COMPOSITE_WEIGHTS, type CompositeWeights } from './config';
import type { RankingResult, ReportRecord } from './types';

const RULE = '='.repeat(70);

/**
 * Shape a ranking into the report record handed to writers.
 */
export function assembleReport(
  sourceCity: string,
  sourceState: string,
  ranking: Pick<RankingResult, 'destinations'>,
  weights: CompositeWeights = COMPOSITE_WEIGHTS
): ReportRecord {
  return {
    sourceCity,
    sourceState,
    weights: { rating: weights.rating, proximity: weights.proximity, category: weights.category },
    entries: ranking.destinations.map(({ record, breakdown }, i) => ({
      rank: i + 1,
      name: record.name,
      city: record.city,
      state: record.state,
      category: record.category,
      rating: record.rating,
      breakdown,
    })),
  };
}

function percent(weight: number): string {
  return `${Math.round(weight * 100)}%`;
}

/**
 * Plain-text rendering, one section per destination.
 */
export function formatReportText(report: ReportRecord): string {
  const { weights } = report;
  const lines: string[] = [
    RULE,
    `TOP ${report.entries.length} WEEKEND GETAWAYS FROM ${report.sourceCity.toUpperCase()}`,
    RULE,
    '',
    `Source: ${report.sourceCity}, ${report.sourceState || 'Unknown'}`,
    `Ranking based on: Rating (${percent(weights.rating)}), Proximity (${percent(weights.proximity)}), Category (${percent(weights.category)})`,
    '',
  ];

  for (const entry of report.entries) {
    const b = entry.breakdown;
    lines.push(`${entry.rank}. ${entry.name}`);
    lines.push(`   Location: ${entry.city}, ${entry.state || 'Unknown'}`);
    lines.push(`   Category: ${entry.category || 'N/A'}`);
    lines.push(`   Rating: ${entry.rating ?? 'N/A'}${b.ratingImputed ? ' (imputed)' : ''}`);
    lines.push(`   Weekend Score: ${b.compositeScore.toFixed(3)}`);
    lines.push(
      `   (Proximity: ${b.proximityScore.toFixed(1)} ${b.proximityTier}, Rating: ${b.ratingScore.toFixed(2)}, Category: ${b.categoryScore.toFixed(2)})`
    );
    lines.push('');
  }

  return lines.join('\n');
}
