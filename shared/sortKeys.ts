/**
 * sortKeys.ts - Sort Dimension Catalog
 *
 * IMPORTANT: This is the SINGLE SOURCE OF TRUTH for sort keys.
 *
 * Key concepts:
 * - id: Stable identifier (e.g., 'bestMatch', 'distance')
 *   → These MUST stay stable. They round-trip through the sort picker
 *     and are accepted by DEFAULT_SORT_KEY in the environment.
 *
 * - label: User-facing name (e.g., 'Best match')
 *   → Shown in the picker and in the second subtitle line of every row.
 *     These CAN change freely.
 *
 * - metric: Reads the matching value from a restaurant's sortingValues.
 *
 * To add a new sort dimension:
 * 1. Add the value to SortingValues in shared/types.ts
 * 2. Add it to the schema in shared/schema.ts
 * 3. Add an entry here and pick its direction in shared/domain/restaurantSorting.ts
 */

import type { Restaurant, SortingValues } from './types';

export type SortKeyId = keyof SortingValues;

export interface SortKey<Id extends SortKeyId = SortKeyId> {
  readonly id: Id;
  readonly label: string;
  metric(restaurant: Restaurant): number;
}

/** Picker entry; `identifier` is what gets passed back to selectSort. */
export interface SortOption {
  identifier: SortKeyId;
  label: string;
}

function sortKey<Id extends SortKeyId>(id: Id, label: string): SortKey<Id> {
  return {
    id,
    label,
    metric: (restaurant) => restaurant.sortingValues[id],
  };
}

export const SORT_KEYS: { readonly [Id in SortKeyId]: SortKey<Id> } = {
  bestMatch: sortKey('bestMatch', 'Best match'),
  newest: sortKey('newest', 'Newest'),
  ratingAverage: sortKey('ratingAverage', 'Rating average'),
  distance: sortKey('distance', 'Distance'),
  popularity: sortKey('popularity', 'Popularity'),
  averageProductPrice: sortKey('averageProductPrice', 'Average product price'),
  deliveryCosts: sortKey('deliveryCosts', 'Delivery costs'),
  minCost: sortKey('minCost', 'Minimum cost'),
};

/** Picker order. */
export const SORT_KEY_IDS: readonly SortKeyId[] = [
  'bestMatch',
  'newest',
  'ratingAverage',
  'distance',
  'popularity',
  'averageProductPrice',
  'deliveryCosts',
  'minCost',
];

export function isSortKeyId(value: string): value is SortKeyId {
  return SORT_KEY_IDS.some((id) => id === value);
}

/**
 * Resolve a raw identifier (e.g. from a picker widget) to its sort key.
 * Returns undefined for unknown or stale identifiers.
 */
export function findSortKey(identifier: string): SortKey | undefined {
  return isSortKeyId(identifier) ? SORT_KEYS[identifier] : undefined;
}

export function getSortOptions(): SortOption[] {
  return SORT_KEY_IDS.map((id) => ({ identifier: id, label: SORT_KEYS[id].label }));
}
