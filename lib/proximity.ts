import { type AdjacencyTable, STATE_ADJACENCY, areNeighbors } from './adjacency';
import { TIER_WEIGHTS, type TierWeights } from './config';
import { normalizeKey } from './normalize';
import type { ProximityTier } from './types';

export const PROXIMITY_TIERS: readonly ProximityTier[] = ['same', 'neighbor', 'distant'];

export interface ProximityResult {
  tier: ProximityTier;
  weight: number;
}

/**
 * Classify how close a destination state is to the source state.
 * Blank or unknown states fall to 'distant'; this never throws.
 */
export function classifyProximity(
  sourceState: string | null | undefined,
  destinationState: string | null | undefined,
  options: { table?: AdjacencyTable; tierWeights?: TierWeights } = {}
): ProximityResult {
  const table = options.table ?? STATE_ADJACENCY;
  const tierWeights = options.tierWeights ?? TIER_WEIGHTS;

  const tier = proximityTier(normalizeKey(sourceState), normalizeKey(destinationState), table);
  return { tier, weight: tierWeights[tier] };
}

function proximityTier(source: string, destination: string, table: AdjacencyTable): ProximityTier {
  if (!source || !destination) return 'distant';
  if (source === destination) return 'same';
  if (areNeighbors(table, source, destination)) return 'neighbor';
  return 'distant';
}
