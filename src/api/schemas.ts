// src/api/schemas.ts
// Zod schemas for catalog payloads returned by the REST API

import { z } from 'zod';
import type { Book, BookAuthor, Lesson, Paginated, Series, Teacher, Theme } from '@/lib/types';

// ============ Basic Types ============

const optionalText = z.string().nullish().transform(value => value ?? null);
const optionalInt = z.number().int().nullish().transform(value => value ?? null);
const activeFlag = z.boolean().nullish().transform(value => value ?? true);

export const NestedRefSchema = z.object({ id: z.number().int() }).passthrough();

/** Parent id from the flat `*_id` field, else from the nested object. */
function parentId(flat: number | null, nested: { id: number } | null | undefined): number | null {
  return flat ?? nested?.id ?? null;
}

// ============ Entity Schemas ============

export const ThemeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: optionalText,
    sort_order: z.number().int().nullish(),
    is_active: activeFlag,
  })
  .transform(
    (raw): Theme => ({
      id: raw.id,
      name: raw.name,
      description: raw.description,
      sort_order: raw.sort_order ?? 0,
      is_active: raw.is_active,
    })
  );

export const BookAuthorSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  biography: optionalText,
  birth_year: optionalInt,
  death_year: optionalInt,
  is_active: activeFlag,
}) satisfies z.ZodType<BookAuthor, z.ZodTypeDef, unknown>;

export const BookSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: optionalText,
    theme_id: optionalInt,
    author_id: optionalInt,
    sort_order: z.number().int().nullish(),
    is_active: activeFlag,
    theme: NestedRefSchema.nullish(),
    author: NestedRefSchema.nullish(),
  })
  .transform(
    (raw): Book => ({
      id: raw.id,
      name: raw.name,
      description: raw.description,
      theme_id: parentId(raw.theme_id, raw.theme),
      author_id: parentId(raw.author_id, raw.author),
      sort_order: raw.sort_order ?? 0,
      is_active: raw.is_active,
    })
  );

export const TeacherSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  biography: optionalText,
  is_active: activeFlag,
}) satisfies z.ZodType<Teacher, z.ZodTypeDef, unknown>;

export const SeriesSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    display_name: optionalText,
    description: optionalText,
    year: optionalInt,
    is_completed: z.boolean().nullish(),
    teacher_id: optionalInt,
    book_id: optionalInt,
    theme_id: optionalInt,
    order: z.number().int().nullish(),
    is_active: activeFlag,
    teacher: NestedRefSchema.nullish(),
    book: NestedRefSchema.nullish(),
    theme: NestedRefSchema.nullish(),
  })
  .transform(
    (raw): Series => ({
      id: raw.id,
      name: raw.name,
      display_name: raw.display_name,
      description: raw.description,
      year: raw.year,
      is_completed: raw.is_completed ?? false,
      teacher_id: parentId(raw.teacher_id, raw.teacher),
      book_id: parentId(raw.book_id, raw.book),
      theme_id: parentId(raw.theme_id, raw.theme),
      order: raw.order ?? 0,
      is_active: raw.is_active,
    })
  );

// Waveforms arrive as a list of amplitudes or as already-encoded JSON text.
const waveformSchema = z
  .union([z.array(z.number()), z.string()])
  .nullish()
  .transform(value => {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : JSON.stringify(value);
  });

export const LessonSchema = z
  .object({
    id: z.number().int(),
    title: optionalText,
    display_title: optionalText,
    lesson_number: z.number().int().nullish(),
    duration_seconds: optionalInt,
    formatted_duration: optionalText,
    audio_url: optionalText,
    audio_file_path: optionalText,
    description: optionalText,
    tags: optionalText,
    waveform_data: waveformSchema,
    series_id: optionalInt,
    teacher_id: optionalInt,
    book_id: optionalInt,
    theme_id: optionalInt,
    is_active: activeFlag,
    series: NestedRefSchema.nullish(),
    teacher: NestedRefSchema.nullish(),
    book: NestedRefSchema.nullish(),
    theme: NestedRefSchema.nullish(),
  })
  .transform(
    (raw): Lesson => ({
      id: raw.id,
      title: raw.title,
      display_title: raw.display_title,
      lesson_number: raw.lesson_number ?? 0,
      duration_seconds: raw.duration_seconds,
      formatted_duration: raw.formatted_duration,
      audio_url: raw.audio_url,
      audio_file_path: raw.audio_file_path,
      description: raw.description,
      tags: raw.tags,
      waveform_data: raw.waveform_data,
      series_id: parentId(raw.series_id, raw.series),
      teacher_id: parentId(raw.teacher_id, raw.teacher),
      book_id: parentId(raw.book_id, raw.book),
      theme_id: parentId(raw.theme_id, raw.theme),
      is_active: raw.is_active,
    })
  );

// ============ Response Envelopes ============

/**
 * Accepts both `{ items, total }` pages and bare lists.
 */
export function paginated<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .union([
      z.object({ items: z.array(item), total: z.number().int().nullish() }),
      z.array(item),
    ])
    .transform((value): Paginated<T> => {
      if (Array.isArray(value)) {
        return { items: value, total: value.length };
      }
      return { items: value.items, total: value.total ?? value.items.length };
    });
}

export const ErrorBodySchema = z.object({
  detail: z.union([z.string(), z.array(z.unknown()), z.record(z.unknown())]).optional(),
  message: z.string().optional(),
});
