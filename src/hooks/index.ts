/**
 * Hooks Exports
 *
 * Reactive access to the data layer for React components.
 */

export { useCollection } from './useCollection';
export { useDownloads } from './useDownloads';
export { useSyncStatus } from './useSyncStatus';
