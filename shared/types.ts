export type RestaurantStatus = 'open' | 'order ahead' | 'closed';

/**
 * One metric per sort dimension, as delivered by the data source.
 * Higher is better for bestMatch, newest, ratingAverage and popularity;
 * lower is better for the rest.
 */
export interface SortingValues {
  bestMatch: number;
  newest: number;
  ratingAverage: number;
  distance: number;
  popularity: number;
  averageProductPrice: number;
  deliveryCosts: number;
  minCost: number;
}

export interface Restaurant {
  readonly name: string;
  readonly status: RestaurantStatus;
  readonly sortingValues: Readonly<SortingValues>;
}

/** Minimal projection drawn for one list row. */
export interface RenderRow {
  readonly title: string;
  readonly subtitle: string;
}

export function isSameRenderRow(a: RenderRow, b: RenderRow): boolean {
  return a.title === b.title && a.subtitle === b.subtitle;
}

export function areSameRenderRows(a: readonly RenderRow[], b: readonly RenderRow[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((row, index) => isSameRenderRow(row, b[index]));
}

/** User-facing copy of the restaurant list screen. */
export const RESTAURANT_LIST_TEXT = {
  screenTitle: 'Restaurant List',
  sortButtonTitle: 'Sort',
  searchPlaceholderText: 'Type Restaurant name',
} as const;
