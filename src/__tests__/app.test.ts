/**
 * Data Layer Tests
 *
 * The wired data layer against an in-process fake of the catalog server.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDataLayer, runStartupSync, type DataLayer } from '@/app';
import type { FetchLike } from '@/api/client';
import { loadConfig, MEMORY_DATABASE } from '@/lib/config';
import { bytes, createTempDir, jsonResponse, streamResponse, type TempDir } from './fixtures';

const ROUTES: Record<string, unknown> = {
  '/api/themes': [{ id: 1, name: 'Stillness', sort_order: 1 }],
  '/api/book-authors': [],
  '/api/books': [],
  '/api/teachers': [],
  '/api/series': { items: [{ id: 3, name: 'Autumn Retreat', theme_id: 1, year: 2023 }], total: 1 },
  '/api/series/3/lessons': [{ id: 7, title: 'Arriving', lesson_number: 1, audio_url: 'media/lesson-7.mp3' }],
};

describe('createDataLayer', () => {
  let dir: TempDir;
  let online: boolean;
  let dropBodies: boolean;
  let layer: DataLayer;

  const fakeServer: FetchLike = async input => {
    if (!online) {
      throw new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
    }
    if (dropBodies) {
      return new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));
          },
        })
      );
    }
    const { pathname } = new URL(input);
    if (pathname === '/api/media/lesson-7.mp3') {
      return streamResponse([bytes(3), bytes(3)], { 'content-length': '6' });
    }
    if (pathname in ROUTES) {
      return jsonResponse(ROUTES[pathname]);
    }
    return jsonResponse({ detail: 'Not Found' }, 404);
  };

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    online = true;
    dropBodies = false;
    dir = await createTempDir();
    const config = loadConfig(
      {
        apiBaseUrl: 'http://api.test',
        databasePath: MEMORY_DATABASE,
        downloadDir: dir.path,
        connectivityCheckIntervalMs: 0,
        restoreRefreshDelayMs: 0,
      },
      {}
    );
    layer = await createDataLayer(config, { fetch: fakeServer });
  });

  afterEach(async () => {
    await layer.dispose();
    await dir.remove();
  });

  it('syncs once on first start', async () => {
    const result = await runStartupSync(layer);

    expect(result).toEqual({ success: true, message: 'Synced 3 items', itemsSynced: 3 });
    expect(await runStartupSync(layer)).toBeNull();
  });

  it('serves synced lessons while the server is down', async () => {
    await runStartupSync(layer);
    online = false;

    await layer.collections.lessons.load({ series_id: 3 });

    expect(layer.collections.lessons.getState()).toMatchObject({ isOfflineMode: true, error: null });
    expect(layer.collections.lessons.getState().items.map(lesson => lesson.title)).toEqual(['Arriving']);
  });

  it('serves the cache when a response breaks off mid-body', async () => {
    await runStartupSync(layer);
    dropBodies = true;

    await layer.collections.themes.load();

    expect(layer.collections.themes.getState()).toMatchObject({ isOfflineMode: true, error: null });
    expect(layer.collections.themes.getState().items.map(theme => theme.name)).toEqual(['Stillness']);
  });

  it('refreshes the catalog when a read reaches the server again', async () => {
    const syncAllData = vi.spyOn(layer.sync, 'syncAllData');
    online = false;
    await layer.collections.themes.load();
    expect(layer.connectivity.lastKnown).toBe(false);

    online = true;
    await layer.collections.themes.load();

    await vi.waitFor(() => expect(syncAllData).toHaveBeenCalledTimes(1));
    await vi.waitFor(() => expect(layer.sync.lastSyncAt).not.toBeNull());
    expect(await layer.cache.themes.count()).toBe(1);
  });

  it('lists downloaded content in the offline library', async () => {
    await runStartupSync(layer);
    await layer.collections.lessons.load({ series_id: 3 });
    const [lesson] = layer.collections.lessons.getState().items;
    expect(lesson).toBeDefined();
    if (!lesson) return;

    const last = await layer.downloadsProvider.startDownload(lesson);
    await layer.offlineLibrary.themes.load();

    expect(last).toMatchObject({ status: 'completed', bytesDownloaded: 6 });
    expect(await layer.downloads.resolvePlaybackSource(lesson)).toEqual({
      kind: 'local',
      path: layer.downloads.filePathFor(7),
    });
    expect(layer.offlineLibrary.themes.getState().items.map(theme => theme.name)).toEqual(['Stillness']);
  });

  it('can be disposed more than once', async () => {
    await layer.dispose();
    await layer.dispose();

    expect(layer.sync.isSyncing).toBe(false);
  });
});
