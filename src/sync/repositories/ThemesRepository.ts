/**
 * ThemesRepository
 *
 * Cached themes, the root of the catalog.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { Theme } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES } from '../types';
import { CacheRepository, seriesDownloadsJoin } from './CacheRepository';

export const ThemeRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  sort_order: z.number().int(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type ThemeRow = z.infer<typeof ThemeRowSchema>;

const THEMES_TABLE: TableConfig<ThemeRow, never> = {
  tableName: CACHE_TABLES.THEMES,
  columns: ['id', 'name', 'description', 'sort_order', 'is_active', 'updated_at'],
  rowSchema: ThemeRowSchema,
  orderBy: [
    ['sort_order', 'ASC'],
    ['name', 'ASC'],
  ],
  filterColumns: [],
  searchColumns: ['name', 'description'],
};

export function themeFromRow(row: ThemeRow): Theme {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    sort_order: row.sort_order,
    is_active: row.is_active === 1,
  };
}

export class ThemesRepository extends CacheRepository<Theme, ThemeRow> {
  protected readonly downloadsJoin = seriesDownloadsJoin('theme_id');

  constructor(store: Store, chunkSize: number) {
    super(store, THEMES_TABLE, chunkSize);
  }

  toRow(theme: Theme, updatedAt: string): ThemeRow {
    return {
      id: theme.id,
      name: theme.name,
      description: theme.description,
      sort_order: theme.sort_order,
      is_active: theme.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: ThemeRow): Theme {
    return themeFromRow(row);
  }
}
