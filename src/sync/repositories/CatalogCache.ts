/**
 * CatalogCache
 *
 * The six catalog cache repositories behind one handle, plus the operations
 * that span all of them.
 */

import { errorMessage } from '@/api/errors';
import type { Store } from '@/lib/database';
import { CACHE_PURGE_ORDER } from '../types';
import { BookAuthorsRepository } from './BookAuthorsRepository';
import { BooksRepository } from './BooksRepository';
import { LessonsRepository } from './LessonsRepository';
import { SeriesRepository } from './SeriesRepository';
import { TeachersRepository } from './TeachersRepository';
import { ThemesRepository } from './ThemesRepository';

export class CatalogCache {
  readonly themes: ThemesRepository;
  readonly bookAuthors: BookAuthorsRepository;
  readonly books: BooksRepository;
  readonly teachers: TeachersRepository;
  readonly series: SeriesRepository;
  readonly lessons: LessonsRepository;

  constructor(
    private readonly store: Store,
    chunkSize: number
  ) {
    this.themes = new ThemesRepository(store, chunkSize);
    this.bookAuthors = new BookAuthorsRepository(store, chunkSize);
    this.books = new BooksRepository(store, chunkSize);
    this.teachers = new TeachersRepository(store, chunkSize);
    this.series = new SeriesRepository(store, chunkSize);
    this.lessons = new LessonsRepository(store, chunkSize);
  }

  /**
   * Delete every cached catalog row, children first, in one transaction.
   * The download ledger is left alone.
   */
  async purgeAll(): Promise<{ deleted: number; error: string | null }> {
    try {
      const deleted = await this.store.transaction(tx => {
        let total = 0;
        for (const table of CACHE_PURGE_ORDER) {
          total += tx.execute(`DELETE FROM ${table}`).rowsAffected;
        }
        return total;
      });
      console.log(`[Cache] Purged ${deleted} cached rows`);
      return { deleted, error: null };
    } catch (error) {
      console.error('[Cache] Failed to purge catalog cache:', error);
      return { deleted: 0, error: errorMessage(error) };
    }
  }

  /**
   * Whether an initial sync has populated the cache. Themes are synced first,
   * so an empty themes table means nothing was ever synced.
   */
  async hasCachedData(): Promise<boolean> {
    return (await this.themes.count({ includeInactive: true })) > 0;
  }
}
