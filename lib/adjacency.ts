/**
 * State adjacency used as a stand-in for travel distance.
 *
 * The authored list may name a border in one direction only; the table built
 * from it is symmetric. Union territories such as Delhi have no entry of
 * their own and pick up neighbors from the states that list them.
 */

import { normalizeKey } from './normalize';

export type AdjacencyTable = ReadonlyMap<string, ReadonlySet<string>>;

export const STATE_NEIGHBORS: Readonly<Record<string, readonly string[]>> = {
  'Haryana': ['Delhi', 'Punjab', 'Rajasthan', 'Uttar Pradesh', 'Himachal Pradesh'],
  'Punjab': ['Delhi', 'Haryana', 'Himachal Pradesh', 'Rajasthan', 'Jammu and Kashmir'],
  'Rajasthan': ['Gujarat', 'Madhya Pradesh', 'Uttar Pradesh', 'Haryana', 'Punjab', 'Delhi'],
  'Uttar Pradesh': ['Delhi', 'Haryana', 'Rajasthan', 'Madhya Pradesh', 'Bihar', 'Uttarakhand'],
  'Himachal Pradesh': ['Jammu and Kashmir', 'Punjab', 'Haryana', 'Uttarakhand'],
  'Uttarakhand': ['Himachal Pradesh', 'Uttar Pradesh'],
  'Maharashtra': ['Gujarat', 'Madhya Pradesh', 'Karnataka', 'Goa', 'Telangana'],
  'Karnataka': ['Maharashtra', 'Goa', 'Tamil Nadu', 'Andhra Pradesh', 'Telangana', 'Kerala'],
  'Tamil Nadu': ['Karnataka', 'Kerala', 'Andhra Pradesh'],
  'Andhra Pradesh': ['Telangana', 'Odisha'],
  'Telangana': ['Maharashtra', 'Karnataka', 'Andhra Pradesh'],
  'Kerala': ['Tamil Nadu', 'Karnataka'],
  'Goa': ['Maharashtra', 'Karnataka'],
  'Gujarat': ['Rajasthan', 'Madhya Pradesh', 'Maharashtra'],
  'West Bengal': ['Bihar', 'Jharkhand', 'Odisha', 'Assam', 'Sikkim'],
  'Odisha': ['West Bengal', 'Jharkhand'],
  'Assam': ['Meghalaya', 'Arunachal Pradesh', 'Nagaland'],
};

/**
 * Build a symmetric lookup keyed by normalized state name.
 */
export function buildAdjacencyTable(
  entries: Readonly<Record<string, readonly string[]>>
): AdjacencyTable {
  const table = new Map<string, Set<string>>();

  const link = (a: string, b: string) => {
    let neighbors = table.get(a);
    if (!neighbors) {
      neighbors = new Set();
      table.set(a, neighbors);
    }
    neighbors.add(b);
  };

  for (const [state, neighbors] of Object.entries(entries)) {
    const from = normalizeKey(state);
    if (!from) continue;
    for (const neighbor of neighbors) {
      const to = normalizeKey(neighbor);
      if (!to || to === from) continue;
      link(from, to);
      link(to, from);
    }
  }

  return table;
}

// Built once at load, never mutated
export const STATE_ADJACENCY: AdjacencyTable = buildAdjacencyTable(STATE_NEIGHBORS);

export function neighborsOf(table: AdjacencyTable, state: string): string[] {
  return Array.from(table.get(normalizeKey(state)) ?? []).sort();
}

export function areNeighbors(table: AdjacencyTable, a: string, b: string): boolean {
  const from = normalizeKey(a);
  const to = normalizeKey(b);
  if (!from || !to) return false;
  return (table.get(from)?.has(to) ?? false) || (table.get(to)?.has(from) ?? false);
}
