/**
 * Test fixtures shared by the data layer suites.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MEMORY_DATABASE } from '@/lib/config';
import { Store } from '@/lib/database';
import type { Book, BookAuthor, Lesson, Series, Teacher, Theme } from '@/lib/types';

// ============================================================================
// Entities
// ============================================================================

export const createTheme = (overrides: Partial<Theme> = {}): Theme => ({
  id: 1,
  name: 'Theme',
  description: null,
  sort_order: 0,
  is_active: true,
  ...overrides,
});

export const createAuthor = (overrides: Partial<BookAuthor> = {}): BookAuthor => ({
  id: 1,
  name: 'Author',
  biography: null,
  birth_year: null,
  death_year: null,
  is_active: true,
  ...overrides,
});

export const createBook = (overrides: Partial<Book> = {}): Book => ({
  id: 1,
  name: 'Book',
  description: null,
  theme_id: null,
  author_id: null,
  sort_order: 0,
  is_active: true,
  ...overrides,
});

export const createTeacher = (overrides: Partial<Teacher> = {}): Teacher => ({
  id: 1,
  name: 'Teacher',
  biography: null,
  is_active: true,
  ...overrides,
});

export const createSeries = (overrides: Partial<Series> = {}): Series => ({
  id: 1,
  name: 'Series',
  display_name: null,
  description: null,
  year: null,
  is_completed: false,
  teacher_id: null,
  book_id: null,
  theme_id: null,
  order: 0,
  is_active: true,
  ...overrides,
});

export const createLesson = (overrides: Partial<Lesson> = {}): Lesson => ({
  id: 1,
  title: 'Lesson',
  display_title: null,
  lesson_number: 1,
  duration_seconds: null,
  formatted_duration: null,
  audio_url: null,
  audio_file_path: null,
  description: null,
  tags: null,
  waveform_data: null,
  series_id: null,
  teacher_id: null,
  book_id: null,
  theme_id: null,
  is_active: true,
  ...overrides,
});

// ============================================================================
// Stores and files
// ============================================================================

export function openMemoryStore(targetVersion?: number): Promise<Store> {
  return Store.open({ path: MEMORY_DATABASE, targetVersion });
}

export interface TempDir {
  path: string;
  file(name: string): string;
  remove(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), 'lesson-cache-'));
  return {
    path,
    file: name => join(path, name),
    remove: () => rm(path, { recursive: true, force: true }),
  };
}

/**
 * Insert a ledger row directly, bypassing the download engine.
 */
export async function insertDownload(
  store: Store,
  row: { lesson_id: number; series_id: number | null; status?: string; file_size?: number; file_path?: string }
): Promise<void> {
  await store.execute(
    `INSERT OR REPLACE INTO downloaded_assets
      (lesson_id, file_path, file_size, download_date, status, series_id, lesson_data)
     VALUES ($1, $2, $3, $4, $5, $6, NULL)`,
    [
      row.lesson_id,
      row.file_path ?? `/downloads/lesson_${row.lesson_id}.mp3`,
      row.file_size ?? 0,
      '2024-01-01T00:00:00.000Z',
      row.status ?? 'completed',
      row.series_id,
    ]
  );
}

/**
 * Response whose body is streamed in the given chunks.
 */
export function streamResponse(chunks: Uint8Array[], headers: Record<string, string> = {}): Response {
  let index = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index < chunks.length) {
        controller.enqueue(chunks[index]);
        index += 1;
      } else {
        controller.close();
      }
    },
  });
  return new Response(body, { status: 200, headers });
}

export function bytes(length: number, fill = 1): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
