/**
 * SyncService
 *
 * Central orchestrator for catalog sync:
 * - Full pull of every catalog type into the local cache, parents first
 * - Per-series lesson refresh
 * - Status tracking for the UI
 * - Background refresh when connectivity comes back
 *
 * Only metadata is synced here; audio files go through the download engine.
 */

import type { ApiClient } from '@/api/client';
import { errorMessage } from '@/api/errors';
import type { ConnectivityMonitor } from '@/lib/connectivity';
import type { CatalogCache } from '../repositories/CatalogCache';
import {
  SYNC_CONFIG,
  type BatchWriteResult,
  type SyncProgressCallback,
  type SyncResult,
  type SyncStatusListener,
  type SyncStatusState,
} from '../types';

export type SyncApi = Pick<
  ApiClient,
  'getThemes' | 'getBookAuthors' | 'getBooks' | 'getTeachers' | 'getSeries' | 'getSeriesLessons'
>;

export interface SyncServiceOptions {
  /** Page size for the full list requests. */
  listPageSize: number;
  restoreRefreshDelayMs?: number;
}

const STEP_COUNT = 6;

export class SyncService {
  private isSyncingInner: boolean = false;
  private statusInner: SyncStatusState = 'idle';
  private lastSyncAtInner: string | null = null;
  private lastErrorInner: string | null = null;

  private statusListeners: Set<SyncStatusListener> = new Set();
  private restoreTimer: ReturnType<typeof setTimeout> | null = null;
  private detachConnectivity: (() => void) | null = null;

  constructor(
    private readonly api: SyncApi,
    private readonly cache: CatalogCache,
    private readonly options: SyncServiceOptions
  ) {}

  /**
   * Detach from connectivity and drop listeners.
   * Call this when the data layer shuts down.
   */
  destroy(): void {
    this.detachConnectivity?.();
    this.detachConnectivity = null;

    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }

    this.statusListeners.clear();
  }

  // ============ Status Getters ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  get status(): SyncStatusState {
    return this.statusInner;
  }

  get lastSyncAt(): string | null {
    return this.lastSyncAtInner;
  }

  get lastError(): string | null {
    return this.lastErrorInner;
  }

  // ============ Sync Triggers ============

  /**
   * True until a first sync has put anything in the cache.
   */
  async needsInitialSync(): Promise<boolean> {
    return !(await this.cache.hasCachedData());
  }

  /**
   * Pull the whole catalog into the cache: themes, authors, books, teachers,
   * series, then the lessons of every cached series. A series whose lessons
   * fail is skipped; any other failure ends the sync.
   */
  async syncAllData(onProgress?: SyncProgressCallback): Promise<SyncResult> {
    if (this.isSyncingInner) {
      console.warn('[Sync] Sync already in progress');
      return { success: false, message: 'Sync already in progress', itemsSynced: 0 };
    }

    this.isSyncingInner = true;
    this.notifyStatusListeners('syncing');
    console.log('[Sync] Starting full sync');

    const report = (message: string, step: number): void => {
      try {
        onProgress?.(message, step / STEP_COUNT);
      } catch (error) {
        console.error('[Sync] Error in progress callback:', error);
      }
    };

    try {
      const limit = this.options.listPageSize;
      const query = { skip: 0, limit, includeInactive: true };
      let total = 0;

      report('Syncing themes', 0);
      total += await this.store('themes', this.cache.themes.upsertBatch((await this.api.getThemes(query)).items));

      report('Syncing authors', 1);
      total += await this.store(
        'book authors',
        this.cache.bookAuthors.upsertBatch((await this.api.getBookAuthors(query)).items)
      );

      report('Syncing books', 2);
      total += await this.store('books', this.cache.books.upsertBatch((await this.api.getBooks(query)).items));

      report('Syncing teachers', 3);
      total += await this.store('teachers', this.cache.teachers.upsertBatch(await this.api.getTeachers(query)));

      report('Syncing series', 4);
      total += await this.store('series', this.cache.series.upsertBatch((await this.api.getSeries(query)).items));

      report('Syncing lessons', 5);
      total += await this.syncAllLessons();

      report('Sync complete', STEP_COUNT);
      this.lastSyncAtInner = new Date().toISOString();
      this.lastErrorInner = null;
      this.notifyStatusListeners('idle');
      console.log(`[Sync] Full sync completed, ${total} items`);

      return { success: true, message: `Synced ${total} items`, itemsSynced: total };
    } catch (error) {
      const message = errorMessage(error, 'Unknown sync error');
      console.error('[Sync] Full sync failed:', error);
      this.lastErrorInner = message;
      this.notifyStatusListeners('error', message);
      return { success: false, message: `Sync failed: ${message}`, itemsSynced: 0 };
    } finally {
      this.isSyncingInner = false;
    }
  }

  /**
   * Refresh the lessons of one series. The endpoint omits the series id, so
   * each lesson takes it from the request. Throws on failure.
   */
  async syncSeriesLessons(seriesId: number): Promise<number> {
    const lessons = await this.api.getSeriesLessons(seriesId);
    const written = await this.store(
      `lessons of series ${seriesId}`,
      this.cache.lessons.upsertBatch(lessons.map(lesson => ({ ...lesson, series_id: seriesId })))
    );
    console.log(`[Sync] Synced ${written} lessons for series ${seriesId}`);
    return written;
  }

  /**
   * Drop the cached catalog and pull it again. Downloads are kept.
   */
  async clearCacheAndResync(onProgress?: SyncProgressCallback): Promise<SyncResult> {
    if (this.isSyncingInner) {
      return { success: false, message: 'Sync already in progress', itemsSynced: 0 };
    }

    // Hold the sync slot through the purge so a restore refresh cannot slip in
    this.isSyncingInner = true;
    let purged: { deleted: number; error: string | null };
    try {
      purged = await this.cache.purgeAll();
    } finally {
      this.isSyncingInner = false;
    }
    if (purged.error) {
      this.lastErrorInner = purged.error;
      this.notifyStatusListeners('error', purged.error);
      return { success: false, message: `Could not clear cache: ${purged.error}`, itemsSynced: 0 };
    }

    console.log('[Sync] Cache cleared, resyncing');
    return this.syncAllData(onProgress);
  }

  // ============ Connectivity ============

  /**
   * Refresh the catalog in the background whenever the server becomes
   * reachable again. Returns a function that detaches.
   */
  attachConnectivity(monitor: Pick<ConnectivityMonitor, 'onChange'>): () => void {
    this.detachConnectivity?.();

    const unsubscribe = monitor.onChange(change => {
      if (!change.restored) return;
      this.scheduleRestoreRefresh();
    });

    this.detachConnectivity = () => {
      unsubscribe();
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
        this.restoreTimer = null;
      }
    };
    return this.detachConnectivity;
  }

  // ============ Status Subscriptions ============

  /**
   * Subscribe to sync status changes.
   */
  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  // ============ Private Methods ============

  private async syncAllLessons(): Promise<number> {
    // Inactive series too, so their lessons are available if reactivated
    const series = await this.cache.series.queryAll({}, { includeInactive: true });
    if (series.error) {
      throw new Error(`Could not read cached series: ${series.error}`);
    }

    let total = 0;
    for (const { id } of series.items) {
      try {
        total += await this.syncSeriesLessons(id);
      } catch (error) {
        console.warn(`[Sync] Skipping lessons of series ${id}:`, error);
      }
    }
    return total;
  }

  private async store(label: string, write: Promise<BatchWriteResult>): Promise<number> {
    const { written, error } = await write;
    if (error) {
      throw new Error(`Caching ${label} failed after ${written} rows: ${error}`);
    }
    console.debug(`[Sync] Cached ${written} ${label}`);
    return written;
  }

  private scheduleRestoreRefresh(): void {
    if (this.restoreTimer) return;

    const delay = this.options.restoreRefreshDelayMs ?? SYNC_CONFIG.RESTORE_REFRESH_DELAY_MS;
    this.restoreTimer = setTimeout(() => {
      this.restoreTimer = null;
      if (this.isSyncingInner) return;
      console.log('[Sync] Connection restored, refreshing catalog');
      this.syncAllData().catch(error => console.error('[Sync] Background refresh failed:', error));
    }, delay);
  }

  private notifyStatusListeners(status: SyncStatusState, error?: string): void {
    this.statusInner = status;
    for (const listener of this.statusListeners) {
      try {
        listener(status, error);
      } catch (e) {
        console.error('[Sync] Error in status listener:', e);
      }
    }
  }
}
