import { NextResponse } from 'next/server';
import { z } from 'zod';
import {
  InvalidWeekendConfigError,
  resolveWeekendConfig,
  type WeekendConfig,
  WeekendConfigOverridesSchema,
} from '@/lib/config';
import { type Dataset, loadDataset } from '@/lib/dataset';
import { env } from '@/lib/env';
import { createWeekendReports } from '@/lib/weekend';

const BatchRequestSchema = z.object({
  cities: z.array(z.string().trim().min(1)).min(1).max(20),
  top: z.number().int().min(1).max(50).optional(),
  config: WeekendConfigOverridesSchema.optional(),
});

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ ok: false, error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = BatchRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { ok: false, error: 'Invalid request payload', details: parsed.error.flatten() },
      { status: 400 }
    );
  }

  let config: WeekendConfig;
  try {
    config = resolveWeekendConfig(parsed.data.config);
  } catch (error) {
    if (error instanceof InvalidWeekendConfigError) {
      return NextResponse.json(
        { ok: false, code: error.code, error: error.message, details: error.issues },
        { status: 400 }
      );
    }
    throw error;
  }

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

  const { reports, failures } = createWeekendReports(dataset.records, parsed.data.cities, {
    config,
    topN: parsed.data.top ?? (parsed.data.config?.topN !== undefined ? config.topN : env.WEEKEND_TOP_N),
  });

  return NextResponse.json({ ok: true, reports, failures, dataSource: dataset.source });
}
