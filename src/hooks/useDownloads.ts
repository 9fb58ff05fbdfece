/**
 * useDownloads Hook
 *
 * Download progress, the downloaded set and the download actions.
 */

import { useDataLayer } from '@/contexts/DataLayerContext';
import type { Lesson } from '@/lib/types';
import type { DownloadsState } from '@/providers/DownloadsProvider';
import type { DownloadProgress } from '@/sync/services/DownloadService';
import { useCallback, useSyncExternalStore } from 'react';

interface UseDownloadsReturn extends DownloadsState {
  startDownload: (lesson: Lesson) => Promise<DownloadProgress | null>;
  cancel: (lessonId: number) => Promise<boolean>;
  pause: (lessonId: number) => boolean;
  resume: (lessonId: number) => boolean;
  deleteDownload: (lessonId: number) => Promise<boolean>;
  isDownloaded: (lessonId: number) => boolean;
  isDownloading: (lessonId: number) => boolean;
  getProgress: (lessonId: number) => DownloadProgress | null;
}

export function useDownloads(): UseDownloadsReturn {
  const { downloads } = useDataLayer();

  const subscribe = useCallback(
    (onStoreChange: () => void) => downloads.subscribe(() => onStoreChange()),
    [downloads]
  );
  const getSnapshot = useCallback(() => downloads.getState(), [downloads]);
  const state = useSyncExternalStore(subscribe, getSnapshot);

  // Derived from the snapshot so components re-render with it
  const isDownloaded = useCallback((lessonId: number) => state.downloadedIds.has(lessonId), [state]);
  const isDownloading = useCallback((lessonId: number) => lessonId in state.activeDownloads, [state]);
  const getProgress = useCallback((lessonId: number) => state.activeDownloads[lessonId] ?? null, [state]);

  return {
    ...state,
    startDownload: useCallback((lesson: Lesson) => downloads.startDownload(lesson), [downloads]),
    cancel: useCallback((lessonId: number) => downloads.cancel(lessonId), [downloads]),
    pause: useCallback((lessonId: number) => downloads.pause(lessonId), [downloads]),
    resume: useCallback((lessonId: number) => downloads.resume(lessonId), [downloads]),
    deleteDownload: useCallback((lessonId: number) => downloads.deleteDownload(lessonId), [downloads]),
    isDownloaded,
    isDownloading,
    getProgress,
  };
}
