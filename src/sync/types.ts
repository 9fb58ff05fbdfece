/**
 * Sync Types
 *
 * Shared type definitions for the catalog cache and the sync orchestrator.
 */

import type { SqlValue } from 'sql.js';

// Re-export entity types from lib/types for convenience
export type {
  Book,
  BookAuthor,
  DownloadStatus,
  DownloadedAsset,
  Lesson,
  Series,
  Teacher,
  Theme,
} from '@/lib/types';

// Sync status for UI
export type SyncStatusState = 'idle' | 'syncing' | 'error';

// Result of a full catalog sync
export interface SyncResult {
  success: boolean;
  message: string;
  itemsSynced: number;
}

export type SyncProgressCallback = (message: string, progress: number) => void;
export type SyncStatusListener = (status: SyncStatusState, error?: string) => void;

// Columns every cache row carries
export interface CacheRowBase {
  id: number;
  is_active: number;
  updated_at: string;
}

export type CacheRow = CacheRowBase & Record<string, SqlValue>;

// Reads never throw past the repository; failures come back here
export interface CacheResult<T> {
  items: T[];
  error: string | null;
}

export interface BatchWriteResult {
  written: number;
  error: string | null;
}

export type SortDirection = 'ASC' | 'DESC';
export type OrderTerm = readonly [column: string, direction: SortDirection];

export interface CacheQueryOptions {
  includeInactive?: boolean;
  search?: string;
  /** Replaces the table's default order. Unknown columns are ignored. */
  sort?: readonly OrderTerm[];
}

// Table names for type safety
export const CACHE_TABLES = {
  THEMES: 'themes',
  BOOK_AUTHORS: 'book_authors',
  BOOKS: 'books',
  TEACHERS: 'teachers',
  SERIES: 'series',
  LESSONS: 'lessons',
} as const;

export type CacheTableName = typeof CACHE_TABLES[keyof typeof CACHE_TABLES];

// Children before parents, for purges
export const CACHE_PURGE_ORDER: CacheTableName[] = [
  CACHE_TABLES.LESSONS,
  CACHE_TABLES.SERIES,
  CACHE_TABLES.BOOKS,
  CACHE_TABLES.TEACHERS,
  CACHE_TABLES.BOOK_AUTHORS,
  CACHE_TABLES.THEMES,
];

export const DOWNLOADS_TABLE = 'downloaded_assets';

// Sync configuration
export const SYNC_CONFIG = {
  RESTORE_REFRESH_DELAY_MS: 2000, // Let the connection settle before refreshing
} as const;
