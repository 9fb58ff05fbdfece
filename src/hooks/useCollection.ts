/**
 * useCollection Hook
 *
 * Subscribes a component to one collection provider and loads it on mount.
 */

import type { CollectionHandle, CollectionState } from '@/providers/CollectionProvider';
import { useCallback, useEffect, useSyncExternalStore } from 'react';

interface UseCollectionOptions {
  /** Load when the component mounts. Defaults to true. */
  loadOnMount?: boolean;
}

interface UseCollectionReturn<TEntity, TFilters> extends CollectionState<TEntity, TFilters> {
  load: (filters?: TFilters) => Promise<void>;
  search: (query: string) => Promise<void>;
  clearSearch: () => Promise<void>;
  refresh: () => Promise<void>;
  setFilters: (filters: TFilters) => Promise<void>;
}

export function useCollection<TEntity, TFilters>(
  provider: CollectionHandle<TEntity, TFilters>,
  options: UseCollectionOptions = {}
): UseCollectionReturn<TEntity, TFilters> {
  const { loadOnMount = true } = options;

  const subscribe = useCallback(
    (onStoreChange: () => void) => provider.subscribe(() => onStoreChange()),
    [provider]
  );
  const getSnapshot = useCallback(() => provider.getState(), [provider]);
  const state = useSyncExternalStore(subscribe, getSnapshot);

  useEffect(() => {
    if (!loadOnMount) return;
    provider.load().catch(error => console.error(`[Collection:${provider.name}] Load on mount failed:`, error));
  }, [provider, loadOnMount]);

  const load = useCallback((filters?: TFilters) => provider.load(filters), [provider]);
  const search = useCallback((query: string) => provider.search(query), [provider]);
  const clearSearch = useCallback(() => provider.clearSearch(), [provider]);
  const refresh = useCallback(() => provider.refresh(), [provider]);
  const setFilters = useCallback((filters: TFilters) => provider.setFilters(filters), [provider]);

  return { ...state, load, search, clearSearch, refresh, setFilters };
}
