import { loadDataset } from '@/lib/dataset';
import { env } from '@/lib/env';
import { summarizeDataset } from '@/lib/inspect';
import { SourceCityNotFoundError } from '@/lib/ranking';
import type { ReportRecord } from '@/lib/types';
import { createWeekendReport, firstCityParam } from '@/lib/weekend';

export const dynamic = 'force-dynamic';

function ReportView({ report }: { report: ReportRecord }) {
  const { weights } = report;
  return (
    <section>
      <h2>Top {report.entries.length} weekend getaways from {report.sourceCity}</h2>
      <p>
        Source: {report.sourceCity}, {report.sourceState || 'Unknown'} · Rating {Math.round(weights.rating * 100)}% ·
        Proximity {Math.round(weights.proximity * 100)}% · Category {Math.round(weights.category * 100)}%
      </p>
      <ol>
        {report.entries.map((entry) => (
          <li key={entry.rank}>
            <strong>{entry.name}</strong> ({entry.city}, {entry.state || 'Unknown'})
            <div>Category: {entry.category || 'N/A'} · Rating: {entry.rating ?? 'N/A'}
              {entry.breakdown.ratingImputed ? ' (imputed)' : ''}</div>
            <div>
              Weekend score {entry.breakdown.compositeScore.toFixed(3)} · proximity{' '}
              {entry.breakdown.proximityScore.toFixed(1)} ({entry.breakdown.proximityTier}) · rating{' '}
              {entry.breakdown.ratingScore.toFixed(2)} · category {entry.breakdown.categoryScore.toFixed(2)}
            </div>
            {entry.breakdown.warnings.length > 0 && (
              <ul>
                {entry.breakdown.warnings.map((warning) => (
                  <li key={warning.code}>{warning.message}</li>
                ))}
              </ul>
            )}
          </li>
        ))}
      </ol>
    </section>
  );
}

export default async function Home({ searchParams }: { searchParams: { city?: string | string[] } }) {
  const dataset = await loadDataset();
  const cities = summarizeDataset(dataset.records).cities.map((c) => c.name);
  const city = firstCityParam(searchParams.city);

  let report: ReportRecord | null = null;
  let error: string | null = null;
  if (city) {
    try {
      report = createWeekendReport(dataset.records, city, { topN: env.WEEKEND_TOP_N });
    } catch (err) {
      if (!(err instanceof SourceCityNotFoundError)) throw err;
      error = err.message;
    }
  }

  return (
    <main>
      <h1>Weekend Getaways</h1>
      <form method="get">
        <label htmlFor="city">Leaving from</label>{' '}
        <select id="city" name="city" defaultValue={city}>
          <option value="">Choose a city</option>
          {cities.map((name) => (
            <option key={name} value={name}>{name}</option>
          ))}
        </select>{' '}
        <button type="submit">Rank</button>
      </form>
      {error && <p role="alert">{error}</p>}
      {report && <ReportView report={report} />}
    </main>
  );
}
