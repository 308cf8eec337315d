import { NextResponse } from 'next/server';
import { type Dataset, loadDataset } from '@/lib/dataset';
import { env } from '@/lib/env';
import { SourceCityNotFoundError } from '@/lib/ranking';
import { formatReportText } from '@/lib/report';
import { WeekendQuerySchema } from '@/lib/types';
import { createWeekendReport } from '@/lib/weekend';

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);

  // Validation
  const parsed = WeekendQuerySchema.safeParse({
    city: searchParams.get('city') ?? '',
    top: searchParams.get('top') ?? undefined,
    format: searchParams.get('format') ?? undefined,
  });
  if (!parsed.success) {
    return NextResponse.json(
      { ok: false, error: 'Invalid query', details: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }
  const { city, top, format } = parsed.data;

  let dataset: Dataset;
  try {
    dataset = await loadDataset();
  } catch (error) {
    console.error('[API] Failed to load dataset:', error instanceof Error ? error.message : error);
    return NextResponse.json(
      { ok: false, error: 'Destination dataset unavailable. Try again.' },
      { status: 503 }
    );
  }

  try {
    const report = createWeekendReport(dataset.records, city, { topN: top ?? env.WEEKEND_TOP_N });

    if (format === 'text') {
      return new NextResponse(formatReportText(report), {
        status: 200,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      });
    }

    return NextResponse.json({ ok: true, report, dataSource: dataset.source });
  } catch (error) {
    if (error instanceof SourceCityNotFoundError) {
      return NextResponse.json(
        { ok: false, code: error.code, error: error.message },
        { status: 404 }
      );
    }
    throw error;
  }
}
