/**
 * DataLayerContext
 *
 * Provides the catalog collections, downloads and sync orchestrator to the
 * React application. The data layer is created outside React (see app.ts)
 * and handed in, so its lifetime is owned by whoever opened the store.
 */

import type { DataLayer } from '@/app';
import type { CatalogHandles } from '@/providers/collections';
import type { DownloadsProvider } from '@/providers/DownloadsProvider';
import type { SyncService } from '@/sync/services/SyncService';
import { createContext, useContext, type ReactNode } from 'react';

export type DownloadsHandle = Pick<
  DownloadsProvider,
  | 'getState'
  | 'subscribe'
  | 'startDownload'
  | 'cancel'
  | 'pause'
  | 'resume'
  | 'deleteDownload'
  | 'isDownloaded'
  | 'isDownloading'
  | 'getProgress'
>;

export type SyncHandle = Pick<
  SyncService,
  'status' | 'isSyncing' | 'lastError' | 'onStatusChange' | 'syncAllData' | 'clearCacheAndResync'
>;

export interface DataLayerContextValue {
  collections: CatalogHandles;
  offlineLibrary: CatalogHandles;
  downloads: DownloadsHandle;
  sync: SyncHandle;
}

const DataLayerContext = createContext<DataLayerContextValue | null>(null);

interface DataLayerProviderProps {
  value: DataLayerContextValue;
  children: ReactNode;
}

export function DataLayerProvider({ value, children }: DataLayerProviderProps) {
  return (
    <DataLayerContext.Provider value={value}>
      {children}
    </DataLayerContext.Provider>
  );
}

/**
 * Context value for a bootstrapped data layer.
 */
export function toContextValue(layer: DataLayer): DataLayerContextValue {
  return {
    collections: layer.collections,
    offlineLibrary: layer.offlineLibrary,
    downloads: layer.downloadsProvider,
    sync: layer.sync,
  };
}

/**
 * Hook to access the data layer.
 */
export function useDataLayer(): DataLayerContextValue {
  const context = useContext(DataLayerContext);
  if (!context) {
    throw new Error('useDataLayer must be used within a DataLayerProvider');
  }
  return context;
}

export function useCatalog(): DataLayerContextValue['collections'] {
  const { collections } = useDataLayer();
  return collections;
}

export function useOfflineLibrary(): DataLayerContextValue['offlineLibrary'] {
  const { offlineLibrary } = useDataLayer();
  return offlineLibrary;
}
