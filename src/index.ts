export { createDataLayer, runStartupSync, type DataLayer, type DataLayerExtras } from './app';

export { ApiClient, type ApiClientOptions, type FetchLike } from './api/client';
export { ApiError, ConnectivityError, errorMessage, isConnectivityError, toConnectivityError } from './api/errors';

export { ConfigError, isApiConfigured, loadConfig, MEMORY_DATABASE, type AppConfig } from './lib/config';
export { ConnectivityMonitor, createApiProbe } from './lib/connectivity';
export { Store, StoreClosedError, StoreOpenError, type StoreOptions } from './lib/database';
export { LATEST_SCHEMA_VERSION, MIGRATIONS, type Migration } from './lib/migrations';
export * from './lib/types';

export {
  CollectionProvider,
  NO_OFFLINE_DATA_MESSAGE,
  type CollectionHandle,
  type CollectionState,
} from './providers/CollectionProvider';
export * from './providers/collections';
export { DownloadsProvider, type DownloadsListener, type DownloadsState } from './providers/DownloadsProvider';

export * from './sync';

export {
  DataLayerProvider,
  toContextValue,
  useCatalog,
  useDataLayer,
  useOfflineLibrary,
  type DataLayerContextValue,
  type DownloadsHandle,
  type SyncHandle,
} from './contexts/DataLayerContext';
export * from './hooks';
