/**
 * Destination dataset loading.
 *
 * Rows come from PostgreSQL when configured and reachable, otherwise from
 * the bundled JSON file. Every row is validated; rows that cannot be used
 * are reported as issues rather than dropped silently.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { TtlCache } from './cache';
import { isDatabaseAvailable, queryDestinations } from './db';
import { env, isDevelopment } from './env';
import { DestinationRecordSchema, type DatasetIssue, type DestinationRecord } from './types';

export type DataSource = 'json' | 'postgres';

export interface Dataset {
  records: DestinationRecord[];
  issues: DatasetIssue[];
  source: DataSource;
}

export class DatasetFormatError extends Error {
  readonly code = 'DATASET_FORMAT';

  constructor(message: string) {
    super(message);
    this.name = 'DatasetFormatError';
  }
}

/**
 * Validate raw rows into immutable destination records.
 */
export function validateDataset(rows: readonly unknown[]): { records: DestinationRecord[]; issues: DatasetIssue[] } {
  const records: DestinationRecord[] = [];
  const issues: DatasetIssue[] = [];

  rows.forEach((row, index) => {
    const parsed = DestinationRecordSchema.safeParse(row);
    if (parsed.success) {
      records.push(Object.freeze(parsed.data));
    } else {
      const reason = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      issues.push({ index, reason });
    }
  });

  return { records, issues };
}

/**
 * Read a JSON array of destination rows.
 */
export async function readDatasetFile(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DatasetFormatError(
      `Dataset ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!Array.isArray(parsed)) {
    throw new DatasetFormatError(`Dataset ${filePath} must contain a JSON array`);
  }
  return parsed;
}

async function fetchRows(): Promise<{ rows: unknown[]; source: DataSource }> {
  if (env.DATA_SOURCE === 'postgres') {
    if (await isDatabaseAvailable()) {
      return { rows: await queryDestinations(), source: 'postgres' };
    }
    console.warn('[Dataset] PostgreSQL unavailable, falling back to JSON file');
  }

  const filePath = path.resolve(process.cwd(), env.DATASET_PATH);
  return { rows: await readDatasetFile(filePath), source: 'json' };
}

const datasetCache = new TtlCache<Dataset>(1, env.DATASET_CACHE_TTL_MS);

/**
 * Load the dataset snapshot, reusing the cached one while it is fresh.
 */
export async function loadDataset(): Promise<Dataset> {
  const cached = datasetCache.get(env.DATA_SOURCE);
  if (cached) return cached;

  const { rows, source } = await fetchRows();
  const { records, issues } = validateDataset(rows);

  if (issues.length > 0) {
    console.warn(`[Dataset] Excluded ${issues.length} of ${rows.length} rows`);
  }
  if (isDevelopment) {
    console.log(`[Dataset] Loaded ${records.length} destinations from ${source}`);
  }

  const dataset: Dataset = { records, issues, source };
  datasetCache.set(env.DATA_SOURCE, dataset);
  return dataset;
}

export function clearDatasetCache(): void {
  datasetCache.clear();
}
