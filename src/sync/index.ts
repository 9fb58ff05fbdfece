/**
 * Sync Module Public API
 *
 * Offline-first catalog cache and download ledger.
 *
 * Architecture:
 * - The remote API is the source of truth; collections read it first
 * - The local SQLite cache is filled by the sync orchestrator and read when
 *   the server cannot be reached
 * - Downloaded audio is tracked in a ledger that survives restarts
 *
 * Usage:
 * 1. Bootstrap with createDataLayer() and wrap the app in DataLayerProvider
 * 2. Use useCollection() for catalog lists and useDownloads() for downloads
 * 3. Use useSyncStatus() for sync status and manual sync triggers
 */

// Types
export type {
  BatchWriteResult,
  CacheQueryOptions,
  CacheResult,
  CacheRow,
  CacheTableName,
  OrderTerm,
  SyncProgressCallback,
  SyncResult,
  SyncStatusListener,
  SyncStatusState,
} from './types';

export { CACHE_PURGE_ORDER, CACHE_TABLES, DOWNLOADS_TABLE, SYNC_CONFIG } from './types';

// Services
export {
  canTransition,
  DOWNLOAD_TRANSITIONS,
  DownloadService,
  DownloadStateError,
  formatFileSize,
  type DownloadProgress,
  type DownloadSource,
  type PlaybackSource,
} from './services/DownloadService';
export { SyncService, type SyncApi } from './services/SyncService';

// Data Sources
export { LocalDataSource } from './datasources/LocalDataSource';
export { BatchWriteError, type CacheFilters, type TableConfig } from './datasources/types';

// Repositories
export * from './repositories';
