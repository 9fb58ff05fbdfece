/**
 * useSyncStatus Hook
 *
 * Current sync status plus manual sync triggers.
 */

import { useDataLayer } from '@/contexts/DataLayerContext';
import type { SyncProgressCallback, SyncResult, SyncStatusState } from '@/sync/types';
import { useCallback, useSyncExternalStore } from 'react';

interface UseSyncStatusReturn {
  status: SyncStatusState;
  isSyncing: boolean;
  error: string | null;
  sync: (onProgress?: SyncProgressCallback) => Promise<SyncResult>;
  resync: (onProgress?: SyncProgressCallback) => Promise<SyncResult>;
}

export function useSyncStatus(): UseSyncStatusReturn {
  const { sync } = useDataLayer();

  const subscribe = useCallback((onStoreChange: () => void) => sync.onStatusChange(() => onStoreChange()), [sync]);
  const status = useSyncExternalStore(subscribe, () => sync.status);
  const error = useSyncExternalStore(subscribe, () => sync.lastError);

  return {
    status,
    isSyncing: status === 'syncing',
    error: status === 'error' ? error : null,
    sync: useCallback((onProgress?: SyncProgressCallback) => sync.syncAllData(onProgress), [sync]),
    resync: useCallback((onProgress?: SyncProgressCallback) => sync.clearCacheAndResync(onProgress), [sync]),
  };
}
