/**
 * CollectionProvider
 *
 * Network-first list state for one content type, with the local cache as
 * fallback when the server cannot be reached:
 * - a successful remote read replaces the items and leaves offline mode
 * - a connectivity failure reads the cache instead and enters offline mode
 * - any other failure is surfaced as is; the cache is not consulted
 *
 * Each load is tagged with a sequence number so a slow, superseded call
 * cannot overwrite the result of a newer one.
 */

import { errorMessage, isConnectivityError } from '@/api/errors';
import type { CacheResult } from '@/sync/types';

export const NO_OFFLINE_DATA_MESSAGE = 'No connection and no saved data';

export interface CollectionState<TEntity, TFilters> {
  items: TEntity[];
  isLoading: boolean;
  error: string | null;
  isOfflineMode: boolean;
  searchQuery: string;
  filters: TFilters;
}

export interface CollectionQuery<TFilters> {
  filters: TFilters;
  search: string;
  /** Upper bound on remote results; the cache fallback cannot page. */
  limit: number;
}

export interface CollectionSource<TEntity, TRow, TFilters> {
  /** Used in log tags. */
  name: string;
  /** Null for collections that only ever read local data. */
  fetchRemote: ((query: CollectionQuery<TFilters>) => Promise<TEntity[]>) | null;
  queryCache: (query: CollectionQuery<TFilters>) => Promise<CacheResult<TRow>>;
  fromRow: (row: TRow) => TEntity;
  compare?: (a: TEntity, b: TEntity) => number;
}

export interface CollectionProviderOptions<TFilters> {
  pageSize: number;
  initialFilters: TFilters;
  /** Decides which failures fall back to the cache. */
  isConnectivityError?: (error: unknown) => boolean;
  /** Told whether each remote read reached the server. */
  onReachability?: (online: boolean) => void;
}

export type CollectionListener<TEntity, TFilters> = (state: CollectionState<TEntity, TFilters>) => void;

/**
 * The part of a provider the UI talks to. Independent of the cache row type.
 */
export interface CollectionHandle<TEntity, TFilters> {
  readonly name: string;
  getState(): CollectionState<TEntity, TFilters>;
  subscribe(listener: CollectionListener<TEntity, TFilters>): () => void;
  load(filters?: TFilters): Promise<void>;
  search(query: string): Promise<void>;
  clearSearch(): Promise<void>;
  refresh(): Promise<void>;
  setFilters(filters: TFilters): Promise<void>;
}

export class CollectionProvider<TEntity, TRow, TFilters> implements CollectionHandle<TEntity, TFilters> {
  private state: CollectionState<TEntity, TFilters>;
  private listeners: Set<CollectionListener<TEntity, TFilters>> = new Set();
  private sequence = 0;
  private readonly classify: (error: unknown) => boolean;

  constructor(
    private readonly source: CollectionSource<TEntity, TRow, TFilters>,
    private readonly options: CollectionProviderOptions<TFilters>
  ) {
    this.classify = options.isConnectivityError ?? isConnectivityError;
    this.state = {
      items: [],
      isLoading: false,
      error: null,
      isOfflineMode: false,
      searchQuery: '',
      filters: options.initialFilters,
    };
  }

  get name(): string {
    return this.source.name;
  }

  // ============ Observable Pattern ============

  getState(): CollectionState<TEntity, TFilters> {
    return this.state;
  }

  /**
   * Subscribe to state changes. Immediately emits the current state.
   */
  subscribe(listener: CollectionListener<TEntity, TFilters>): () => void {
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(changes: Partial<CollectionState<TEntity, TFilters>>): void {
    this.state = { ...this.state, ...changes };
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        console.error(`[Collection:${this.source.name}] Error in listener:`, error);
      }
    }
  }

  // ============ Loading ============

  /**
   * Load the collection for `filters`, remote first, cache on connectivity failure.
   */
  async load(filters: TFilters = this.state.filters): Promise<void> {
    const sequence = ++this.sequence;
    this.setState({ isLoading: true, error: null, filters });

    const query: CollectionQuery<TFilters> = {
      filters,
      search: this.state.searchQuery,
      limit: this.options.pageSize,
    };

    const fetchRemote = this.source.fetchRemote;
    if (!fetchRemote) {
      await this.loadFromCache(query, sequence);
      return;
    }

    let remoteError: unknown;
    try {
      const items = await fetchRemote(query);
      this.reportReachability(true);
      if (this.isStale(sequence)) return;
      this.setState({ items, isLoading: false, isOfflineMode: false });
      return;
    } catch (error) {
      remoteError = error;
    }

    const unreachable = this.classify(remoteError);
    // Any answer from the server, even an error, means it is reachable
    this.reportReachability(!unreachable);
    if (this.isStale(sequence)) return;

    if (!unreachable) {
      console.error(`[Collection:${this.source.name}] Load failed:`, remoteError);
      this.setState({ isLoading: false, error: errorMessage(remoteError) });
      return;
    }

    console.warn(`[Collection:${this.source.name}] Server unreachable, reading cache`);
    await this.loadFromCache(query, sequence);
  }

  /**
   * Reload with a search query.
   */
  search(query: string): Promise<void> {
    this.setState({ searchQuery: query });
    return this.load();
  }

  clearSearch(): Promise<void> {
    return this.search('');
  }

  /**
   * Reload with the last-used filters and search.
   */
  refresh(): Promise<void> {
    return this.load();
  }

  setFilters(filters: TFilters): Promise<void> {
    return this.load(filters);
  }

  private async loadFromCache(query: CollectionQuery<TFilters>, sequence: number): Promise<void> {
    let cached: CacheResult<TRow>;
    try {
      cached = await this.source.queryCache(query);
    } catch (error) {
      cached = { items: [], error: errorMessage(error) };
    }
    if (this.isStale(sequence)) return;

    if (cached.error) {
      console.error(`[Collection:${this.source.name}] Cache read failed:`, cached.error);
      this.setState({ isLoading: false, error: cached.error });
      return;
    }

    if (cached.items.length === 0) {
      this.setState({ items: [], isLoading: false, isOfflineMode: true, error: NO_OFFLINE_DATA_MESSAGE });
      return;
    }

    const items = cached.items.map(row => this.source.fromRow(row));
    if (this.source.compare) {
      items.sort(this.source.compare);
    }
    console.log(`[Collection:${this.source.name}] Showing ${items.length} cached items`);
    this.setState({ items, isLoading: false, isOfflineMode: true, error: null });
  }

  private reportReachability(online: boolean): void {
    try {
      this.options.onReachability?.(online);
    } catch (error) {
      console.error(`[Collection:${this.source.name}] Error in reachability callback:`, error);
    }
  }

  private isStale(sequence: number): boolean {
    return sequence !== this.sequence;
  }
}

