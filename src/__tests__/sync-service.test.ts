/**
 * Sync Service Tests
 *
 * Full catalog pull into a real in-memory cache with a scripted API.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError, ConnectivityError } from '@/api/errors';
import type { ConnectivityListener } from '@/lib/connectivity';
import type { Store } from '@/lib/database';
import type { Lesson } from '@/lib/types';
import { CatalogCache } from '@/sync/repositories/CatalogCache';
import { DownloadsRepository } from '@/sync/repositories/DownloadsRepository';
import { createDeferred } from '@/sync/services/ProgressChannel';
import { SyncService, type SyncApi } from '@/sync/services/SyncService';
import {
  createAuthor,
  createBook,
  createLesson,
  createSeries,
  createTeacher,
  createTheme,
  insertDownload,
  openMemoryStore,
} from './fixtures';

// ============================================================================
// Scripted API
// ============================================================================

const SERIES_LESSONS: Record<number, Lesson[]> = {
  10: [createLesson({ id: 100, lesson_number: 1 }), createLesson({ id: 101, lesson_number: 2 })],
  11: [createLesson({ id: 110 })],
};

function createScriptedApi(calls: string[] = []) {
  return {
    getThemes: vi.fn<SyncApi['getThemes']>(async () => {
      calls.push('themes');
      return { items: [createTheme({ id: 1 }), createTheme({ id: 2 })], total: 2 };
    }),
    getBookAuthors: vi.fn<SyncApi['getBookAuthors']>(async () => {
      calls.push('authors');
      return { items: [createAuthor({ id: 1 })], total: 1 };
    }),
    getBooks: vi.fn<SyncApi['getBooks']>(async () => {
      calls.push('books');
      return { items: [createBook({ id: 1 })], total: 1 };
    }),
    getTeachers: vi.fn<SyncApi['getTeachers']>(async () => {
      calls.push('teachers');
      return [createTeacher({ id: 1 })];
    }),
    getSeries: vi.fn<SyncApi['getSeries']>(async () => {
      calls.push('series');
      return {
        items: [createSeries({ id: 10 }), createSeries({ id: 11, is_active: false }), createSeries({ id: 12 })],
        total: 3,
      };
    }),
    getSeriesLessons: vi.fn<SyncApi['getSeriesLessons']>(async seriesId => {
      calls.push(`lessons:${seriesId}`);
      const lessons = SERIES_LESSONS[seriesId];
      if (!lessons) {
        throw new ConnectivityError('reset', 'Connection failed (ECONNRESET)');
      }
      return lessons;
    }),
  };
}

// ============================================================================
// Test Suite
// ============================================================================

describe('SyncService', () => {
  let store: Store;
  let cache: CatalogCache;

  beforeEach(async () => {
    store = await openMemoryStore();
    cache = new CatalogCache(store, 50);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  const createService = (api: SyncApi) => new SyncService(api, cache, { listPageSize: 1000 });

  describe('syncAllData', () => {
    it('pulls parents before children and lessons of every cached series', async () => {
      const calls: string[] = [];
      const api = createScriptedApi(calls);
      const sync = createService(api);

      const result = await sync.syncAllData();

      expect(result).toEqual({ success: true, message: 'Synced 11 items', itemsSynced: 11 });
      expect(calls.slice(0, 5)).toEqual(['themes', 'authors', 'books', 'teachers', 'series']);
      expect(calls.slice(5).sort()).toEqual(['lessons:10', 'lessons:11', 'lessons:12']);
      expect(api.getThemes).toHaveBeenCalledWith({ skip: 0, limit: 1000, includeInactive: true });
    });

    it('stores lessons with the series they were requested for', async () => {
      const sync = createService(createScriptedApi());

      await sync.syncAllData();

      const tenth = await cache.lessons.queryAll({ series_id: 10 });
      const inactiveSeries = await cache.lessons.queryAll({ series_id: 11 });
      expect(tenth.items.map(row => row.id)).toEqual([100, 101]);
      expect(inactiveSeries.items.map(row => row.id)).toEqual([110]);
      expect(await cache.series.count({ includeInactive: true })).toBe(3);
    });

    it('reports progress in six steps', async () => {
      const sync = createService(createScriptedApi());
      const progress: [string, number][] = [];

      await sync.syncAllData((message, value) => progress.push([message, value]));

      expect(progress).toEqual([
        ['Syncing themes', 0],
        ['Syncing authors', 1 / 6],
        ['Syncing books', 2 / 6],
        ['Syncing teachers', 3 / 6],
        ['Syncing series', 4 / 6],
        ['Syncing lessons', 5 / 6],
        ['Sync complete', 1],
      ]);
    });

    it('keeps going when the progress callback throws', async () => {
      const sync = createService(createScriptedApi());

      const result = await sync.syncAllData(() => {
        throw new Error('render failed');
      });

      expect(result.success).toBe(true);
    });

    it('fails on a rejected list request and records the error', async () => {
      const api = createScriptedApi();
      api.getBooks.mockRejectedValueOnce(new ApiError(500, 'Internal server error'));
      const sync = createService(api);
      const statuses: [string, string | undefined][] = [];
      sync.onStatusChange((status, error) => statuses.push([status, error]));

      const result = await sync.syncAllData();

      expect(result).toEqual({ success: false, message: 'Sync failed: Internal server error', itemsSynced: 0 });
      expect(sync.status).toBe('error');
      expect(sync.lastError).toBe('Internal server error');
      expect(sync.lastSyncAt).toBeNull();
      expect(statuses).toEqual([
        ['syncing', undefined],
        ['error', 'Internal server error'],
      ]);
      expect(api.getTeachers).not.toHaveBeenCalled();
    });

    it('fails when the cache refuses a batch', async () => {
      vi.spyOn(cache.themes, 'upsertBatch').mockResolvedValue({ written: 0, error: 'attempt to write a readonly database' });
      const sync = createService(createScriptedApi());

      const result = await sync.syncAllData();

      expect(result.message).toBe('Sync failed: Caching themes failed after 0 rows: attempt to write a readonly database');
    });

    it('refuses to start while a sync is running', async () => {
      const api = createScriptedApi();
      const themes = createDeferred<{ items: never[]; total: number }>();
      api.getThemes.mockReturnValueOnce(themes.promise);
      const sync = createService(api);

      const first = sync.syncAllData();
      const second = await sync.syncAllData();
      const resync = await sync.clearCacheAndResync();
      themes.resolve({ items: [], total: 0 });

      expect(second).toEqual({ success: false, message: 'Sync already in progress', itemsSynced: 0 });
      expect(resync.message).toBe('Sync already in progress');
      expect(sync.isSyncing).toBe(true);
      expect((await first).success).toBe(true);
      expect(sync.isSyncing).toBe(false);
      expect(api.getThemes).toHaveBeenCalledTimes(1);
    });

    it('marks the sync time and returns to idle', async () => {
      const sync = createService(createScriptedApi());

      await sync.syncAllData();

      expect(sync.status).toBe('idle');
      expect(sync.lastError).toBeNull();
      expect(sync.lastSyncAt).not.toBeNull();
    });
  });

  describe('syncSeriesLessons', () => {
    it('overrides the series id of every lesson', async () => {
      const api = createScriptedApi();
      api.getSeriesLessons.mockResolvedValueOnce([createLesson({ id: 50, series_id: 9 })]);
      const sync = createService(api);

      expect(await sync.syncSeriesLessons(5)).toBe(1);
      expect((await cache.lessons.getById(50))?.series_id).toBe(5);
    });

    it('throws when the request fails', async () => {
      const sync = createService(createScriptedApi());

      await expect(sync.syncSeriesLessons(12)).rejects.toBeInstanceOf(ConnectivityError);
    });
  });

  describe('initial sync and resync', () => {
    it('needs an initial sync only while the cache is empty', async () => {
      const sync = createService(createScriptedApi());

      expect(await sync.needsInitialSync()).toBe(true);
      await sync.syncAllData();
      expect(await sync.needsInitialSync()).toBe(false);
    });

    it('replaces stale cache rows and keeps downloads', async () => {
      await cache.themes.upsertOne(createTheme({ id: 99 }));
      await insertDownload(store, { lesson_id: 100, series_id: 10 });
      const sync = createService(createScriptedApi());

      const result = await sync.clearCacheAndResync();

      expect(result.success).toBe(true);
      expect(await cache.themes.getById(99)).toBeNull();
      expect(await new DownloadsRepository(store).isDownloaded(100)).toBe(true);
    });

    it('holds off other syncs while the cache is being cleared', async () => {
      const purge = createDeferred<{ deleted: number; error: string | null }>();
      vi.spyOn(cache, 'purgeAll').mockReturnValueOnce(purge.promise);
      const api = createScriptedApi();
      const sync = createService(api);

      const resync = sync.clearCacheAndResync();
      const during = await sync.syncAllData();
      purge.resolve({ deleted: 0, error: null });

      expect(during).toEqual({ success: false, message: 'Sync already in progress', itemsSynced: 0 });
      expect((await resync).success).toBe(true);
      expect(api.getThemes).toHaveBeenCalledTimes(1);
    });

    it('reports a purge failure without syncing', async () => {
      vi.spyOn(cache, 'purgeAll').mockResolvedValue({ deleted: 0, error: 'database is locked' });
      const api = createScriptedApi();
      const sync = createService(api);

      const result = await sync.clearCacheAndResync();

      expect(result).toEqual({ success: false, message: 'Could not clear cache: database is locked', itemsSynced: 0 });
      expect(sync.status).toBe('error');
      expect(api.getThemes).not.toHaveBeenCalled();
    });
  });

  describe('connectivity', () => {
    let emit: ConnectivityListener = () => undefined;
    const monitor = {
      onChange: (listener: ConnectivityListener) => {
        emit = listener;
        return () => {
          emit = () => undefined;
        };
      },
    };

    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('refreshes the catalog shortly after the connection returns', async () => {
      const api = createScriptedApi();
      api.getThemes.mockRejectedValue(new ConnectivityError('refused', 'Connection failed (ECONNREFUSED)'));
      const sync = createService(api);
      sync.attachConnectivity(monitor);

      emit({ online: false, restored: false });
      emit({ online: true, restored: false });
      await vi.advanceTimersByTimeAsync(5000);
      expect(api.getThemes).not.toHaveBeenCalled();

      emit({ online: true, restored: true });
      await vi.advanceTimersByTimeAsync(1999);
      expect(api.getThemes).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      expect(api.getThemes).toHaveBeenCalledTimes(1);

      await vi.waitFor(() => expect(sync.status).toBe('error'));
    });

    it('drops a pending refresh when detached', async () => {
      const api = createScriptedApi();
      const sync = createService(api);
      const detach = sync.attachConnectivity(monitor);

      emit({ online: true, restored: true });
      detach();
      await vi.advanceTimersByTimeAsync(5000);

      expect(api.getThemes).not.toHaveBeenCalled();
    });

    it('drops a pending refresh on destroy', async () => {
      const api = createScriptedApi();
      const sync = createService(api);
      sync.attachConnectivity(monitor);

      emit({ online: true, restored: true });
      sync.destroy();
      await vi.advanceTimersByTimeAsync(5000);

      expect(api.getThemes).not.toHaveBeenCalled();
    });
  });
});
