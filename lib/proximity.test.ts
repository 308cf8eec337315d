import { describe, expect, it } from 'vitest';
import { buildAdjacencyTable } from './adjacency';
import { TIER_WEIGHTS } from './config';
import { classifyProximity, PROXIMITY_TIERS } from './proximity';

describe('classifyProximity', () => {
  it('classifies destinations from Delhi', () => {
    expect(classifyProximity('Delhi', ' delhi ')).toEqual({ tier: 'same', weight: 1.0 });
    expect(classifyProximity('Delhi', 'Haryana')).toEqual({ tier: 'neighbor', weight: 0.7 });
    expect(classifyProximity('Delhi', 'Kerala')).toEqual({ tier: 'distant', weight: 0.4 });
  });

  it('treats blank states as distant', () => {
    expect(classifyProximity('', '')).toEqual({ tier: 'distant', weight: 0.4 });
    expect(classifyProximity('Delhi', null)).toEqual({ tier: 'distant', weight: 0.4 });
    expect(classifyProximity(undefined, 'Delhi')).toEqual({ tier: 'distant', weight: 0.4 });
  });

  it('uses the supplied table and tier weights', () => {
    const table = buildAdjacencyTable({ North: ['South'] });
    const tierWeights = { same: 0.9, neighbor: 0.5, distant: 0.1 };

    expect(classifyProximity('South', 'North', { table, tierWeights })).toEqual({ tier: 'neighbor', weight: 0.5 });
    expect(classifyProximity('Delhi', 'Haryana', { table, tierWeights })).toEqual({ tier: 'distant', weight: 0.1 });
  });
});

describe('tier weights', () => {
  it('decrease from same to distant', () => {
    const weights = PROXIMITY_TIERS.map((tier) => TIER_WEIGHTS[tier]);

    expect(weights).toEqual([1.0, 0.7, 0.4]);
  });
});
