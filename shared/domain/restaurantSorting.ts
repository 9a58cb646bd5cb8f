/**
 * shared/domain/restaurantSorting.ts - Restaurant Sort Strategies
 *
 * Purpose: Supplies the comparator used by the restaurant list for each sort key.
 *
 * This module is PURE and has no external dependencies beyond TypeScript.
 *
 * Key concepts:
 * - Status priority: open restaurants first, then "order ahead", then closed
 * - Direction: each metric is sorted so the "best" value comes first
 *   (highest rating, nearest distance, cheapest delivery, ...)
 * - Name tie-break: keeps the ordering total when every metric is equal
 */

import type { Restaurant, RestaurantStatus } from '../types';
import type { SortKey, SortKeyId } from '../sortKeys';

/** Negative when `a` goes before `b`. */
export type RestaurantComparator = (a: Restaurant, b: Restaurant) => number;

export interface SortStrategyCatalog {
  comparatorFor(sortKey: SortKey): RestaurantComparator;
}

export type SortDirection = 'asc' | 'desc';

export const SORT_DIRECTIONS: Record<SortKeyId, SortDirection> = {
  bestMatch: 'desc',
  newest: 'desc',
  ratingAverage: 'desc',
  distance: 'asc',
  popularity: 'desc',
  averageProductPrice: 'asc',
  deliveryCosts: 'asc',
  minCost: 'asc',
};

const STATUS_PRIORITY: Record<RestaurantStatus, number> = {
  open: 0,
  'order ahead': 1,
  closed: 2,
};

export function compareByStatus(a: Restaurant, b: Restaurant): number {
  return STATUS_PRIORITY[a.status] - STATUS_PRIORITY[b.status];
}

function compareByName(a: Restaurant, b: Restaurant): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export function compareByMetric(sortKey: SortKey, direction: SortDirection): RestaurantComparator {
  const sign = direction === 'asc' ? 1 : -1;
  return (a, b) => sign * (sortKey.metric(a) - sortKey.metric(b));
}

export interface SortingCatalogOptions {
  /** Put open restaurants before closed ones regardless of the metric. Default: true */
  statusFirst?: boolean;
}

/**
 * Build a catalog that chains status priority (optional), the metric in its
 * natural direction, and the restaurant name.
 */
export function createSortingCatalog(options: SortingCatalogOptions = {}): SortStrategyCatalog {
  const statusFirst = options.statusFirst ?? true;

  return {
    comparatorFor(sortKey) {
      const byMetric = compareByMetric(sortKey, SORT_DIRECTIONS[sortKey.id]);

      return (a, b) => {
        if (statusFirst) {
          const byStatus = compareByStatus(a, b);
          if (byStatus !== 0) return byStatus;
        }
        return byMetric(a, b) || compareByName(a, b);
      };
    },
  };
}

export const defaultSortingCatalog: SortStrategyCatalog = createSortingCatalog();
