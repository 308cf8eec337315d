import { NextResponse } from 'next/server';
import { loadDataset } from '@/lib/dataset';
import { summarizeDataset } from '@/lib/inspect';

export async function GET() {
  try {
    const dataset = await loadDataset();
    return NextResponse.json({
      ok: true,
      dataSource: dataset.source,
      summary: summarizeDataset(dataset.records),
      issues: dataset.issues,
    });
  } catch (error) {
    console.error('[API] Failed to load dataset:', error instanceof Error ? error.message : error);
    return NextResponse.json(
      { ok: false, error: 'Destination dataset unavailable. Try again.' },
      { status: 503 }
    );
  }
}
