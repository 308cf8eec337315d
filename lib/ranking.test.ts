import { describe, expect, it } from 'vitest';
import { DEFAULT_WEEKEND_CONFIG, resolveWeekendConfig } from './config';
import { normalizeKey } from './normalize';
import { rankDestinations, resolveImputedRating, resolveSourceState, SourceCityNotFoundError } from './ranking';
import { destination, PUNE_DATASET } from './testing/fixtures';

const names = (result: ReturnType<typeof rankDestinations>) => result.destinations.map((d) => d.record.name);

describe('resolveSourceState', () => {
  it('takes the state of the first record in the city', () => {
    expect(resolveSourceState(PUNE_DATASET, ' pune')).toBe('Maharashtra');
  });

  it('fails for a city missing from the dataset', () => {
    expect(() => resolveSourceState(PUNE_DATASET, 'Atlantis')).toThrow(SourceCityNotFoundError);
    expect(() => resolveSourceState(PUNE_DATASET, '')).toThrow("City '' not found in dataset");
  });
});

describe('rankDestinations', () => {
  it('orders candidates by composite score and truncates', () => {
    const result = rankDestinations(PUNE_DATASET, 'Pune', { topN: 3 });

    expect(result.sourceState).toBe('Maharashtra');
    expect(names(result)).toEqual(['Lonavala Lake', 'Mysore Palace', 'Baga Beach']);
    expect(result.destinations[0].breakdown.compositeScore).toBeCloseTo(0.91, 12);
    expect(result.destinations[0].breakdown.proximityTier).toBe('same');
    expect(result.candidateCount).toBe(5);
    expect(result.excludedSameCity).toBe(3);
  });

  it('defaults to the top five', () => {
    const result = rankDestinations(PUNE_DATASET, 'Pune');

    expect(names(result)).toEqual(['Lonavala Lake', 'Mysore Palace', 'Baga Beach', 'Charminar', 'Victoria Memorial']);
  });

  it('never returns a destination in the source city', () => {
    const result = rankDestinations(PUNE_DATASET, 'PUNE', { topN: 10 });

    for (const entry of result.destinations) {
      expect(normalizeKey(entry.record.city)).not.toBe('pune');
    }
  });

  it('returns every candidate when fewer than topN remain', () => {
    const records = [
      destination('Home Fort', 'Home', 'Kerala', 'Fort', 4),
      destination('One', 'A', 'Kerala', 'Lake', 4),
      destination('Two', 'B', 'Kerala', 'Lake', 4.1),
      destination('Three', 'C', 'Goa', 'Lake', 4.2),
    ];

    const result = rankDestinations(records, 'Home', { topN: 5 });

    expect(result.destinations).toHaveLength(3);
  });

  it('throws SourceCityNotFoundError for an unknown city', () => {
    let caught: unknown;
    try {
      rankDestinations(PUNE_DATASET, 'Atlantis');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceCityNotFoundError);
    expect(caught).toMatchObject({ code: 'SOURCE_CITY_NOT_FOUND', city: 'Atlantis' });
  });

  it('rejects a non-positive topN', () => {
    expect(() => rankDestinations(PUNE_DATASET, 'Pune', { topN: 0 })).toThrow(RangeError);
  });

  it('breaks exact ties by name', () => {
    const records = [
      destination('Home Fort', 'Home', 'Kerala', 'Fort', 4),
      destination('Beta Falls', 'Far', 'Assam', 'Falls', 4),
      destination('Alpha Falls', 'Far', 'Assam', 'Falls', 4),
    ];

    expect(names(rankDestinations(records, 'Home'))).toEqual(['Alpha Falls', 'Beta Falls']);
  });

  it('breaks composite ties by rating before name', () => {
    // 0.5 * 1.0 + 0.3 * 0.4 + 0.2 * 0.6 == 0.5 * 0.64 + 0.3 * 1.0 + 0.2 * 0.6
    const records = [
      destination('Home Fort', 'Home', 'Kerala', 'Fort', 4),
      destination('Alpha Point', 'Near', 'Kerala', 'Museum', 3.2),
      destination('Zeta Point', 'Far', 'Assam', 'Museum', 5),
    ];

    const result = rankDestinations(records, 'Home');

    expect(result.destinations[0].breakdown.compositeScore).toBeCloseTo(result.destinations[1].breakdown.compositeScore, 9);
    expect(names(result)).toEqual(['Zeta Point', 'Alpha Point']);
  });

  it('is deterministic across runs and input order', () => {
    const first = rankDestinations(PUNE_DATASET, 'Pune', { topN: 10 });
    const second = rankDestinations([...PUNE_DATASET].reverse(), 'Pune', { topN: 10 });

    expect(JSON.stringify(second.destinations)).toBe(JSON.stringify(first.destinations));
  });

  it('imputes the dataset median for a missing rating', () => {
    const records = [
      destination('Shaniwar Wada', 'Pune', 'Maharashtra', 'Fort', 4.0),
      destination('Lonavala Lake', 'Lonavala', 'Maharashtra', 'Lake', null),
      destination('Baga Beach', 'Goa', 'Goa', 'Beach', 4.4),
      destination('Mysore Palace', 'Mysore', 'Karnataka', 'Palace', 4.8),
    ];

    const lake = rankDestinations(records, 'Pune').destinations.find((d) => d.record.name === 'Lonavala Lake');

    expect(lake?.breakdown.ratingImputed).toBe(true);
    expect(lake?.breakdown.ratingScore).toBeCloseTo(0.88, 12);
  });

  it('applies custom weights', () => {
    const config = resolveWeekendConfig({ weights: { rating: 0, proximity: 1, category: 0 } });
    const result = rankDestinations(PUNE_DATASET, 'Pune', { config, topN: 1 });

    expect(names(result)).toEqual(['Lonavala Lake']);
    expect(result.destinations[0].breakdown.compositeScore).toBe(1);
  });
});

describe('resolveImputedRating', () => {
  it('uses a fixed imputed rating when configured', () => {
    expect(resolveImputedRating(PUNE_DATASET, { ...DEFAULT_WEEKEND_CONFIG, imputedRating: 3 })).toBe(3);
  });

  it('falls back to the scale midpoint when no rating parses', () => {
    const records = [destination('A', 'X', 'Goa', 'Beach', null), destination('B', 'Y', 'Goa', 'Beach', 'n/a')];

    expect(resolveImputedRating(records, DEFAULT_WEEKEND_CONFIG)).toBe(2.5);
  });
});
