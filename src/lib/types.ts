// Catalog entity types as consumed by the app

export interface Theme {
  id: number;
  name: string;
  description: string | null;
  sort_order: number;
  is_active: boolean;
}

export interface BookAuthor {
  id: number;
  name: string;
  biography: string | null;
  birth_year: number | null;
  death_year: number | null;
  is_active: boolean;
}

export interface Book {
  id: number;
  name: string;
  description: string | null;
  theme_id: number | null;
  author_id: number | null;
  sort_order: number;
  is_active: boolean;
}

export interface Teacher {
  id: number;
  name: string;
  biography: string | null;
  is_active: boolean;
}

export interface Series {
  id: number;
  name: string;
  display_name: string | null;
  description: string | null;
  year: number | null;
  is_completed: boolean;
  teacher_id: number | null;
  book_id: number | null;
  theme_id: number | null;
  order: number;
  is_active: boolean;
}

export interface Lesson {
  id: number;
  title: string | null;
  display_title: string | null;
  lesson_number: number;
  duration_seconds: number | null;
  formatted_duration: string | null;
  audio_url: string | null;
  audio_file_path: string | null;
  description: string | null;
  tags: string | null;
  waveform_data: string | null;
  series_id: number | null;
  teacher_id: number | null;
  book_id: number | null;
  theme_id: number | null;
  is_active: boolean;
}

export type CatalogEntity = Theme | BookAuthor | Book | Teacher | Series | Lesson;

// Download lifecycle

export const DOWNLOAD_STATUSES = ['pending', 'downloading', 'completed', 'failed', 'paused'] as const;

export type DownloadStatus = (typeof DOWNLOAD_STATUSES)[number];

export interface DownloadedAsset {
  lesson_id: number;
  file_path: string;
  file_size: number;
  download_date: string;
  status: DownloadStatus;
  series_id: number | null;
  lesson: Lesson | null;
}

export interface Paginated<T> {
  items: T[];
  total: number;
}

// Helper functions

/**
 * Decode a persisted status name. Unknown names are treated as failed so the
 * user can retry.
 */
export function parseDownloadStatus(value: unknown): DownloadStatus {
  return DOWNLOAD_STATUSES.find(status => status === value) ?? 'failed';
}

/**
 * Title shown for a lesson: display title, then title, then its number.
 */
export function lessonLabel(lesson: Pick<Lesson, 'display_title' | 'title' | 'lesson_number'>): string {
  return lesson.display_title ?? lesson.title ?? `Lesson ${lesson.lesson_number}`;
}

export function seriesLabel(series: Pick<Series, 'display_name' | 'name'>): string {
  return series.display_name ?? series.name;
}
