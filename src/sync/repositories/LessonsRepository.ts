/**
 * LessonsRepository
 *
 * Cached lessons, ordered by lesson number within their series.
 */

import { z } from 'zod';
import type { Store } from '@/lib/database';
import type { Lesson } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { CACHE_TABLES, DOWNLOADS_TABLE } from '../types';
import { CacheRepository } from './CacheRepository';

export const LessonRowSchema = z.object({
  id: z.number().int(),
  title: z.string().nullable(),
  display_title: z.string().nullable(),
  lesson_number: z.number().int(),
  duration_seconds: z.number().int().nullable(),
  formatted_duration: z.string().nullable(),
  audio_url: z.string().nullable(),
  audio_file_path: z.string().nullable(),
  description: z.string().nullable(),
  tags: z.string().nullable(),
  waveform_data: z.string().nullable(),
  series_id: z.number().int().nullable(),
  teacher_id: z.number().int().nullable(),
  book_id: z.number().int().nullable(),
  theme_id: z.number().int().nullable(),
  is_active: z.number().int(),
  updated_at: z.string(),
});

export type LessonRow = z.infer<typeof LessonRowSchema>;
export type LessonFilter = 'series_id' | 'teacher_id' | 'book_id' | 'theme_id';

const LESSONS_TABLE: TableConfig<LessonRow, LessonFilter> = {
  tableName: CACHE_TABLES.LESSONS,
  columns: [
    'id',
    'title',
    'display_title',
    'lesson_number',
    'duration_seconds',
    'formatted_duration',
    'audio_url',
    'audio_file_path',
    'description',
    'tags',
    'waveform_data',
    'series_id',
    'teacher_id',
    'book_id',
    'theme_id',
    'is_active',
    'updated_at',
  ],
  rowSchema: LessonRowSchema,
  orderBy: [['lesson_number', 'ASC']],
  filterColumns: ['series_id', 'teacher_id', 'book_id', 'theme_id'],
  searchColumns: ['title', 'display_title'],
};

export function lessonFromRow(row: LessonRow): Lesson {
  return {
    id: row.id,
    title: row.title,
    display_title: row.display_title,
    lesson_number: row.lesson_number,
    duration_seconds: row.duration_seconds,
    formatted_duration: row.formatted_duration,
    audio_url: row.audio_url,
    audio_file_path: row.audio_file_path,
    description: row.description,
    tags: row.tags,
    waveform_data: row.waveform_data,
    series_id: row.series_id,
    teacher_id: row.teacher_id,
    book_id: row.book_id,
    theme_id: row.theme_id,
    is_active: row.is_active === 1,
  };
}

export class LessonsRepository extends CacheRepository<Lesson, LessonRow, LessonFilter> {
  protected readonly downloadsJoin = `INNER JOIN ${DOWNLOADS_TABLE} d ON d.lesson_id = p.id`;

  constructor(store: Store, chunkSize: number) {
    super(store, LESSONS_TABLE, chunkSize);
  }

  toRow(lesson: Lesson, updatedAt: string): LessonRow {
    return {
      id: lesson.id,
      title: lesson.title,
      display_title: lesson.display_title,
      lesson_number: lesson.lesson_number,
      duration_seconds: lesson.duration_seconds,
      formatted_duration: lesson.formatted_duration,
      audio_url: lesson.audio_url,
      audio_file_path: lesson.audio_file_path,
      description: lesson.description,
      tags: lesson.tags,
      waveform_data: lesson.waveform_data,
      series_id: lesson.series_id,
      teacher_id: lesson.teacher_id,
      book_id: lesson.book_id,
      theme_id: lesson.theme_id,
      is_active: lesson.is_active ? 1 : 0,
      updated_at: updatedAt,
    };
  }

  fromRow(row: LessonRow): Lesson {
    return lessonFromRow(row);
  }
}
