/**
 * TeachersRepository
 *
 * Cached teachers.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { Teacher } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES } from '../types';
import { CacheRepository, seriesDownloadsJoin } from './CacheRepository';

export const TeacherRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  biography: z.string().nullable(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type TeacherRow = z.infer<typeof TeacherRowSchema>;

const TEACHERS_TABLE: TableConfig<TeacherRow, never> = {
  tableName: CACHE_TABLES.TEACHERS,
  columns: ['id', 'name', 'biography', 'is_active', 'updated_at'],
  rowSchema: TeacherRowSchema,
  orderBy: [['name', 'ASC']],
  filterColumns: [],
  searchColumns: ['name', 'biography'],
};

export function teacherFromRow(row: TeacherRow): Teacher {
  return {
    id: row.id,
    name: row.name,
    biography: row.biography,
    is_active: row.is_active === 1,
  };
}

export class TeachersRepository extends CacheRepository<Teacher, TeacherRow> {
  protected readonly downloadsJoin = seriesDownloadsJoin('teacher_id');

  constructor(store: Store, chunkSize: number) {
    super(store, TEACHERS_TABLE, chunkSize);
  }

  toRow(teacher: Teacher, updatedAt: string): TeacherRow {
    return {
      id: teacher.id,
      name: teacher.name,
      biography: teacher.biography,
      is_active: teacher.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: TeacherRow): Teacher {
    return teacherFromRow(row);
  }
}
