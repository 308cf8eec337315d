import type { DestinationRecord } from '@/lib/types';

export function destination(
  name: string,
  city: string,
  state: string,
  category: string,
  rating: number | string | null
): DestinationRecord {
  return Object.freeze({ name, city, state, category, rating });
}

// Source city Pune (Maharashtra) plus five candidates in other cities
export const PUNE_DATASET: readonly DestinationRecord[] = [
  destination('Shaniwar Wada', 'Pune', 'Maharashtra', 'Fort', 4.0),
  destination('Raja Kelkar Museum', 'Pune', 'Maharashtra', 'Museum', 4.9),
  destination('Sinhagad Fort', ' PUNE ', 'Maharashtra', 'Fort', 4.8),
  destination('Lonavala Lake', 'Lonavala', 'Maharashtra', 'Lake', 4.2),
  destination('Baga Beach', 'Goa', 'Goa', 'Beach', 4.4),
  destination('Mysore Palace', 'Mysore', 'Karnataka', 'Palace', 4.7),
  destination('Charminar', 'Hyderabad', 'Telangana', 'Historical', 4.5),
  destination('Victoria Memorial', 'Kolkata', 'West Bengal', 'Museum', 4.6),
];
