/**
 * SeriesRepository
 *
 * Cached lesson series, newest year first.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { Series } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES, DOWNLOADS_TABLE } from '../types';
import { CacheRepository } from './CacheRepository';

export const SeriesRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  display_name: z.string().nullable(),
  description: z.string().nullable(),
  year: z.number().int().nullable(),
  is_completed: z.number().int(),
  teacher_id: z.number().int().nullable(),
  book_id: z.number().int().nullable(),
  theme_id: z.number().int().nullable(),
  series_order: z.number().int(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type SeriesRow = z.infer<typeof SeriesRowSchema>;
export type SeriesFilter = 'theme_id' | 'book_id' | 'teacher_id';

const SERIES_TABLE: TableConfig<SeriesRow, SeriesFilter> = {
  tableName: CACHE_TABLES.SERIES,
  columns: [
    'id',
    'name',
    'display_name',
    'description',
    'year',
    'is_completed',
    'teacher_id',
    'book_id',
    'theme_id',
    'series_order',
    'is_active',
    'updated_at',
  ],
  rowSchema: SeriesRowSchema,
  orderBy: [
    ['year', 'DESC'],
    ['series_order', 'ASC'],
    ['name', 'ASC'],
  ],
  filterColumns: ['theme_id', 'book_id', 'teacher_id'],
  searchColumns: ['name', 'display_name'],
};

export function seriesFromRow(row: SeriesRow): Series {
  return {
    id: row.id,
    name: row.name,
    display_name: row.display_name,
    description: row.description,
    year: row.year,
    is_completed: row.is_completed === 1,
    teacher_id: row.teacher_id,
    book_id: row.book_id,
    theme_id: row.theme_id,
    order: row.series_order,
    is_active: row.is_active === 1,
  };
}

export class SeriesRepository extends CacheRepository<Series, SeriesRow, SeriesFilter> {
  protected readonly downloadsJoin = `INNER JOIN ${DOWNLOADS_TABLE} d ON d.series_id = p.id`;

  constructor(store: Store, chunkSize: number) {
    super(store, SERIES_TABLE, chunkSize);
  }

  toRow(series: Series, updatedAt: string): SeriesRow {
    return {
      id: series.id,
      name: series.name,
      display_name: series.display_name,
      description: series.description,
      year: series.year,
      is_completed: series.is_completed ? 1 : 0,
      teacher_id: series.teacher_id,
      book_id: series.book_id,
      theme_id: series.theme_id,
      series_order: series.order,
      is_active: series.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: SeriesRow): Series {
    return seriesFromRow(row);
  }
}
