/**
 * Data layer bootstrap
 *
 * Opens the local store and wires every component of the data layer into one
 * handle. A store that cannot be opened is fatal: nothing here works without it.
 */

import { ApiClient, type ApiClientOptions } from '@/api/client';
import type { AppConfig } from '@/lib/config';
import { ConnectivityMonitor, createApiProbe } from '@/lib/connectivity';
import { Store } from '@/lib/database';
import { createCatalogCollections, createOfflineLibrary, type CatalogCollections } from '@/providers/collections';
import { DownloadsProvider } from '@/providers/DownloadsProvider';
import { CatalogCache } from '@/sync/repositories/CatalogCache';
import { DownloadsRepository } from '@/sync/repositories/DownloadsRepository';
import { DownloadService } from '@/sync/services/DownloadService';
import { SyncService } from '@/sync/services/SyncService';
import type { SyncProgressCallback, SyncResult } from '@/sync/types';

export interface DataLayer {
  config: AppConfig;
  store: Store;
  api: ApiClient;
  cache: CatalogCache;
  ledger: DownloadsRepository;
  downloads: DownloadService;
  downloadsProvider: DownloadsProvider;
  sync: SyncService;
  collections: CatalogCollections;
  /** Collections limited to content with completed downloads. */
  offlineLibrary: CatalogCollections;
  connectivity: ConnectivityMonitor;
  dispose(): Promise<void>;
}

export type DataLayerExtras = Pick<ApiClientOptions, 'fetch' | 'getAccessToken'>;

export async function createDataLayer(config: AppConfig, extras: DataLayerExtras = {}): Promise<DataLayer> {
  const store = await Store.open({ path: config.databasePath, targetVersion: config.schemaVersion });

  const api = ApiClient.fromConfig(config, extras);
  const cache = new CatalogCache(store, config.batchChunkSize);
  const ledger = new DownloadsRepository(store);
  const downloads = new DownloadService(ledger, api, { downloadDir: config.downloadDir });

  // Rows left in flight by a previous run can never finish
  await downloads.recoverInterrupted();

  const downloadsProvider = new DownloadsProvider(downloads, ledger);
  await downloadsProvider.initialize();

  const sync = new SyncService(api, cache, {
    listPageSize: config.listPageSize,
    restoreRefreshDelayMs: config.restoreRefreshDelayMs,
  });
  const connectivity = new ConnectivityMonitor(
    createApiProbe(() => api.getThemes({ limit: 1 })),
    { cacheSeconds: config.connectivityCacheSeconds }
  );
  sync.attachConnectivity(connectivity);
  if (config.connectivityCheckIntervalMs > 0) {
    connectivity.start(config.connectivityCheckIntervalMs);
  }

  // Collection reads double as connectivity checks
  const collections = createCatalogCollections({
    api,
    cache,
    pageSize: config.listPageSize,
    onReachability: online => connectivity.setOnline(online),
  });
  const offlineLibrary = createOfflineLibrary({ cache, pageSize: config.listPageSize });

  let disposed = false;
  const dispose = async (): Promise<void> => {
    if (disposed) return;
    disposed = true;
    connectivity.stop();
    sync.destroy();
    downloadsProvider.dispose();
    await store.close();
  };

  console.log('[DataLayer] Ready');
  return {
    config,
    store,
    api,
    cache,
    ledger,
    downloads,
    downloadsProvider,
    sync,
    collections,
    offlineLibrary,
    connectivity,
    dispose,
  };
}

/**
 * Pull the catalog when nothing has been cached yet. Returns null when the
 * cache was already populated.
 */
export async function runStartupSync(
  layer: Pick<DataLayer, 'sync'>,
  onProgress?: SyncProgressCallback
): Promise<SyncResult | null> {
  if (!(await layer.sync.needsInitialSync())) {
    console.log('[DataLayer] Cache populated, skipping initial sync');
    return null;
  }
  return layer.sync.syncAllData(onProgress);
}
