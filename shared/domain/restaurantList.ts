/**
 * shared/domain/restaurantList.ts - Restaurant List Presentation State
 *
 * Purpose: Turns the raw restaurant list into the rows a list screen draws.
 * Used by the React hook (client) and by the list-restaurants script (node).
 *
 * Pipeline:
 * 1. initialize() loads restaurants from the data source (the only async step)
 * 2. The master list is sorted in place by the active sort key
 * 3. The active search term filters the sorted master list by name
 * 4. Each visible restaurant becomes a { title, subtitle } render row
 *
 * The observer is told about a change only when the new rows differ
 * element-wise from the previous ones.
 */

import {
  RESTAURANT_LIST_TEXT,
  areSameRenderRows,
  type RenderRow,
  type Restaurant,
} from '../types';
import { findSortKey, getSortOptions, type SortKey, type SortOption } from '../sortKeys';
import type { SortStrategyCatalog } from './restaurantSorting';

// ============================================================================
// Collaborators
// ============================================================================

export interface RestaurantDataSource {
  /** Settles at most once per call. */
  loadRestaurants(): Promise<readonly Restaurant[]>;
}

export interface RestaurantListObserver {
  /** Re-read rows through rowCount()/row() or renderRows. */
  onRenderRowsChanged(): void;
}

export interface RestaurantListErrorSink {
  onLoadError(error: unknown): void;
}

export interface RestaurantListNavigator {
  showDetails(restaurant: Restaurant): void;
}

// ============================================================================
// Row derivation
// ============================================================================

/**
 * Two-line subtitle: the status, then the active sort label and value.
 *
 * Example:
 *   makeRenderRow(sushiBar, SORT_KEYS.distance)
 *   → { title: 'Sushi Bar', subtitle: 'open\nDistance: 1190' }
 */
export function makeRenderRow(restaurant: Restaurant, sortKey: SortKey): RenderRow {
  return {
    title: restaurant.name,
    subtitle: `${restaurant.status}\n${sortKey.label}: ${String(sortKey.metric(restaurant))}`,
  };
}

/** Case-insensitive name match; a blank term keeps every restaurant. */
export function filterByName(restaurants: readonly Restaurant[], term: string): Restaurant[] {
  if (term.trim() === '') return [...restaurants];

  const needle = term.toLowerCase();
  return restaurants.filter((restaurant) => restaurant.name.toLowerCase().includes(needle));
}

// ============================================================================
// Controller
// ============================================================================

export class RestaurantListController {
  readonly screenTitle = RESTAURANT_LIST_TEXT.screenTitle;
  readonly sortButtonTitle = RESTAURANT_LIST_TEXT.sortButtonTitle;
  readonly searchPlaceholderText = RESTAURANT_LIST_TEXT.searchPlaceholderText;
  readonly sortOptions: readonly SortOption[] = getSortOptions();

  // Not owned; any of these may be unset.
  observer?: RestaurantListObserver;
  errorSink?: RestaurantListErrorSink;
  navigator?: RestaurantListNavigator;

  private restaurants: Restaurant[] = [];
  private visible: readonly Restaurant[] = [];
  private rows: readonly RenderRow[] = [];
  private sortKey: SortKey;
  private searchTerm = '';

  constructor(
    private readonly dataSource: RestaurantDataSource,
    private readonly sorting: SortStrategyCatalog,
    defaultSortKey: SortKey,
  ) {
    this.sortKey = defaultSortKey;
  }

  get activeSortKey(): SortKey {
    return this.sortKey;
  }

  get activeSearchTerm(): string {
    return this.searchTerm;
  }

  /** Same array instance until the rows change. */
  get renderRows(): readonly RenderRow[] {
    return this.rows;
  }

  /**
   * Load the restaurants once and show them under the active sort key.
   * A failed load goes to the error sink and leaves the state untouched.
   *
   * Overlapping calls are not guarded: completions apply in arrival order.
   */
  async initialize(): Promise<void> {
    let loaded: readonly Restaurant[];
    try {
      loaded = await this.dataSource.loadRestaurants();
    } catch (error) {
      this.errorSink?.onLoadError(error);
      return;
    }

    this.restaurants = [...loaded];
    this.selectSort(this.sortKey.id);
  }

  /** Unknown identifiers are ignored. */
  selectSort(identifier: string): void {
    const sortKey = findSortKey(identifier);
    if (!sortKey) return;

    this.sortKey = sortKey;
    this.restaurants.sort(this.sorting.comparatorFor(sortKey));
    this.refresh();
  }

  /** `null`/`undefined` (no search text at all) is ignored; blank clears the filter. */
  setSearchTerm(term: string | null | undefined): void {
    if (term == null) return;

    this.searchTerm = term;
    this.refresh();
  }

  rowCount(): number {
    return this.rows.length;
  }

  row(index: number): RenderRow | undefined {
    if (!this.isRowIndex(index)) return undefined;
    return this.rows[index];
  }

  /** Hand the restaurant behind a visible row to the navigator. */
  selectRow(index: number): void {
    if (!this.isRowIndex(index)) return;
    this.navigator?.showDetails(this.visible[index]);
  }

  private isRowIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.rows.length;
  }

  private refresh(): void {
    const visible = filterByName(this.restaurants, this.searchTerm);
    const rows = visible.map((restaurant) => makeRenderRow(restaurant, this.sortKey));

    // Kept even when rows are equal: two restaurants can render identically.
    this.visible = visible;

    if (areSameRenderRows(rows, this.rows)) return;

    this.rows = rows;
    this.observer?.onRenderRowsChanged();
  }
}
