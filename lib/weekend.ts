import type { WeekendConfig } from './config';
import { isDevelopment } from './env';
import { logRankingDebug, rankDestinations, SourceCityNotFoundError } from './ranking';
import { assembleReport } from './report';
import type { DestinationRecord, ReportRecord } from './types';

export interface WeekendReportOptions {
  config?: WeekendConfig;
  topN?: number;
}

export interface WeekendFailure {
  city: string;
  code: SourceCityNotFoundError['code'];
  error: string;
}

/**
 * City from a page query. A repeated `?city=` arrives as an array; the
 * first value wins.
 */
export function firstCityParam(value: string | string[] | undefined): string {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() ?? '';
}

/**
 * Rank destinations for one source city and shape the report.
 */
export function createWeekendReport(
  records: readonly DestinationRecord[],
  sourceCity: string,
  options: WeekendReportOptions = {}
): ReportRecord {
  const ranking = rankDestinations(records, sourceCity, options);
  if (isDevelopment) {
    logRankingDebug(ranking);
  }
  return assembleReport(ranking.sourceCity, ranking.sourceState, ranking, options.config?.weights);
}

/**
 * Reports for several cities. An unknown city is recorded as a failure
 * and does not stop the others; any other error propagates.
 */
export function createWeekendReports(
  records: readonly DestinationRecord[],
  sourceCities: readonly string[],
  options: WeekendReportOptions = {}
): { reports: ReportRecord[]; failures: WeekendFailure[] } {
  const reports: ReportRecord[] = [];
  const failures: WeekendFailure[] = [];

  for (const city of sourceCities) {
    try {
      reports.push(createWeekendReport(records, city, options));
    } catch (error) {
      if (!(error instanceof SourceCityNotFoundError)) throw error;
      console.warn(`[Ranking] ${error.message}`);
      failures.push({ city, code: error.code, error: error.message });
    }
  }

  return { reports, failures };
}
