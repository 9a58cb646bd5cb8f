import { useCallback, useEffect, useState, useSyncExternalStore } from 'react';
import type {
    RestaurantListController,
    RestaurantListErrorSink,
    RestaurantListObserver,
} from '@shared/domain/restaurantList';
import type { SortKey, SortOption } from '@shared/sortKeys';
import type { RenderRow } from '@shared/types';

export interface UseRestaurantListReturn {
    rows: readonly RenderRow[];
    activeSortKey: SortKey;
    searchTerm: string;
    sortOptions: readonly SortOption[];
    error: unknown;
    selectSort: (identifier: string) => void;
    setSearchTerm: (term: string) => void;
    selectRow: (index: number) => void;
}

/**
 * Binds a RestaurantListController to a component.
 * Loads the list on mount; the controller is the single source of truth for rows.
 */
export function useRestaurantList(controller: RestaurantListController): UseRestaurantListReturn {
    const [error, setError] = useState<unknown>(null);
    const [activeSortKey, setActiveSortKey] = useState(controller.activeSortKey);
    const [searchTerm, setSearchTermState] = useState(controller.activeSearchTerm);

    const subscribe = useCallback((onStoreChange: () => void) => {
        const observer: RestaurantListObserver = { onRenderRowsChanged: onStoreChange };
        controller.observer = observer;
        return () => {
            if (controller.observer === observer) controller.observer = undefined;
        };
    }, [controller]);

    const getRows = useCallback(() => controller.renderRows, [controller]);
    const rows = useSyncExternalStore(subscribe, getRows, getRows);

    useEffect(() => {
        const report = (loadError: unknown) => setError(() => loadError);
        const errorSink: RestaurantListErrorSink = { onLoadError: report };
        controller.errorSink = errorSink;
        setError(null);

        controller.initialize().catch(report);

        return () => {
            if (controller.errorSink === errorSink) controller.errorSink = undefined;
        };
    }, [controller]);

    const selectSort = useCallback((identifier: string) => {
        controller.selectSort(identifier);
        setActiveSortKey(controller.activeSortKey);
    }, [controller]);

    const setSearchTerm = useCallback((term: string) => {
        controller.setSearchTerm(term);
        setSearchTermState(controller.activeSearchTerm);
    }, [controller]);

    const selectRow = useCallback((index: number) => {
        controller.selectRow(index);
    }, [controller]);

    return {
        rows,
        activeSortKey,
        searchTerm,
        sortOptions: controller.sortOptions,
        error,
        selectSort,
        setSearchTerm,
        selectRow,
    };
}
