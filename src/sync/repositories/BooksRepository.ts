/**
 * BooksRepository
 *
 * Cached books, filterable by theme and author.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { Book } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES } from '../types';
import { CacheRepository, seriesDownloadsJoin } from './CacheRepository';

export const BookRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  theme_id: z.number().int().nullable(),
  author_id: z.number().int().nullable(),
  sort_order: z.number().int(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type BookRow = z.infer<typeof BookRowSchema>;
export type BookFilter = 'theme_id' | 'author_id';

const BOOKS_TABLE: TableConfig<BookRow, BookFilter> = {
  tableName: CACHE_TABLES.BOOKS,
  columns: ['id', 'name', 'description', 'theme_id', 'author_id', 'sort_order', 'is_active', 'updated_at'],
  rowSchema: BookRowSchema,
  orderBy: [
    ['sort_order', 'ASC'],
    ['name', 'ASC'],
  ],
  filterColumns: ['theme_id', 'author_id'],
  searchColumns: ['name', 'description'],
};

export function bookFromRow(row: BookRow): Book {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    theme_id: row.theme_id,
    author_id: row.author_id,
    sort_order: row.sort_order,
    is_active: row.is_active === 1,
  };
}

export class BooksRepository extends CacheRepository<Book, BookRow, BookFilter> {
  protected readonly downloadsJoin = seriesDownloadsJoin('book_id');

  constructor(store: Store, chunkSize: number) {
    super(store, BOOKS_TABLE, chunkSize);
  }

  toRow(book: Book, updatedAt: string): BookRow {
    return {
      id: book.id,
      name: book.name,
      description: book.description,
      theme_id: book.theme_id,
      author_id: book.author_id,
      sort_order: book.sort_order,
      is_active: book.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: BookRow): Book {
    return bookFromRow(row);
  }
}
