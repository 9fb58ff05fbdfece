/**
 * BookAuthorsRepository
 *
 * Cached book authors. Authors reach their downloads through books and series.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { BookAuthor } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES, DOWNLOADS_TABLE } from '../types';
import { CacheRepository } from './CacheRepository';

export const BookAuthorRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  biography: z.string().nullable(),
  birth_year: z.number().int().nullable(),
  death_year: z.number().int().nullable(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type BookAuthorRow = z.infer<typeof BookAuthorRowSchema>;

const BOOK_AUTHORS_TABLE: TableConfig<BookAuthorRow, never> = {
  tableName: CACHE_TABLES.BOOK_AUTHORS,
  columns: ['id', 'name', 'biography', 'birth_year', 'death_year', 'is_active', 'updated_at'],
  rowSchema: BookAuthorRowSchema,
  orderBy: [['name', 'ASC']],
  filterColumns: [],
  searchColumns: ['name', 'biography'],
};

export function bookAuthorFromRow(row: BookAuthorRow): BookAuthor {
  return {
    id: row.id,
    name: row.name,
    biography: row.biography,
    birth_year: row.birth_year,
    death_year: row.death_year,
    is_active: row.is_active === 1,
  };
}

export class BookAuthorsRepository extends CacheRepository<BookAuthor, BookAuthorRow> {
  protected readonly downloadsJoin = `
    INNER JOIN books b ON b.author_id = p.id
    INNER JOIN series s ON s.book_id = b.id AND s.is_active = 1
    INNER JOIN ${DOWNLOADS_TABLE} d ON d.series_id = s.id
  `;

  constructor(store: Store, chunkSize: number) {
    super(store, BOOK_AUTHORS_TABLE, chunkSize);
  }

  toRow(author: BookAuthor, updatedAt: string): BookAuthorRow {
    return {
      id: author.id,
      name: author.name,
      biography: author.biography,
      birth_year: author.birth_year,
      death_year: author.death_year,
      is_active: author.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: BookAuthorRow): BookAuthor {
    return bookAuthorFromRow(row);
  }
}
