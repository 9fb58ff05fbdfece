/**
 * Collection factories
 *
 * One CollectionProvider per content type, wired to the API client and the
 * matching cache repository. The offline library variants read only cached
 * content that leads to a completed download.
 */

import type { ApiClient } from '@/api/client';
import type { Book, BookAuthor, Lesson, Series, Teacher, Theme } from '@/lib/types';
import type { BookAuthorRow } from '@/sync/repositories/BookAuthorsRepository';
import type { BookRow } from '@/sync/repositories/BooksRepository';
import type { CatalogCache } from '@/sync/repositories/CatalogCache';
import type { LessonRow } from '@/sync/repositories/LessonsRepository';
import type { SeriesRow } from '@/sync/repositories/SeriesRepository';
import type { TeacherRow } from '@/sync/repositories/TeachersRepository';
import type { ThemeRow } from '@/sync/repositories/ThemesRepository';
import { CollectionProvider, type CollectionHandle } from './CollectionProvider';

export type NoFilters = Record<never, never>;

export interface BookFilters {
  theme_id?: number | null;
  author_id?: number | null;
}

export interface SeriesFilters {
  theme_id?: number | null;
  book_id?: number | null;
  teacher_id?: number | null;
}

export interface LessonFilters {
  series_id?: number | null;
}

export type CatalogApi = Pick<
  ApiClient,
  'getThemes' | 'getBookAuthors' | 'getBooks' | 'getTeachers' | 'getSeries' | 'getSeriesLessons' | 'getLessons'
>;

export interface CollectionDeps {
  api: CatalogApi;
  cache: CatalogCache;
  pageSize: number;
  /** Receives the outcome of every remote read, e.g. ConnectivityMonitor.setOnline. */
  onReachability?: (online: boolean) => void;
}

// ============ Default Orders ============

const byName = (a: { name: string }, b: { name: string }): number => a.name.localeCompare(b.name);

export const compareThemes = (a: Theme, b: Theme): number => a.sort_order - b.sort_order || byName(a, b);
export const compareBooks = (a: Book, b: Book): number => a.sort_order - b.sort_order || byName(a, b);

export function compareSeries(a: Series, b: Series): number {
  // Newest year first, series without a year last
  const yearA = a.year ?? Number.NEGATIVE_INFINITY;
  const yearB = b.year ?? Number.NEGATIVE_INFINITY;
  if (yearA !== yearB) return yearB > yearA ? 1 : -1;
  return a.order - b.order || byName(a, b);
}

export const compareLessons = (a: Lesson, b: Lesson): number => a.lesson_number - b.lesson_number;

function matchesSearch(search: string, ...values: (string | null)[]): boolean {
  const needle = search.trim().toLowerCase();
  if (!needle) return true;
  return values.some(value => value?.toLowerCase().includes(needle) ?? false);
}

// ============ Catalog Collections ============

export function createThemesProvider(deps: CollectionDeps): CollectionProvider<Theme, ThemeRow, NoFilters> {
  return new CollectionProvider<Theme, ThemeRow, NoFilters>(
    {
      name: 'themes',
      fetchRemote: async ({ search, limit }) => (await deps.api.getThemes({ search, limit })).items,
      queryCache: ({ search }) => deps.cache.themes.queryAll({}, { search }),
      fromRow: row => deps.cache.themes.fromRow(row),
      compare: compareThemes,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

export function createBookAuthorsProvider(
  deps: CollectionDeps
): CollectionProvider<BookAuthor, BookAuthorRow, NoFilters> {
  return new CollectionProvider<BookAuthor, BookAuthorRow, NoFilters>(
    {
      name: 'book-authors',
      fetchRemote: async ({ search, limit }) => (await deps.api.getBookAuthors({ search, limit })).items,
      queryCache: ({ search }) => deps.cache.bookAuthors.queryAll({}, { search }),
      fromRow: row => deps.cache.bookAuthors.fromRow(row),
      compare: byName,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

export function createBooksProvider(deps: CollectionDeps): CollectionProvider<Book, BookRow, BookFilters> {
  return new CollectionProvider<Book, BookRow, BookFilters>(
    {
      name: 'books',
      fetchRemote: async ({ filters, search, limit }) =>
        (
          await deps.api.getBooks({
            search,
            limit,
            themeId: filters.theme_id ?? undefined,
            authorId: filters.author_id ?? undefined,
          })
        ).items,
      queryCache: ({ filters, search }) => deps.cache.books.queryAll(filters, { search }),
      fromRow: row => deps.cache.books.fromRow(row),
      compare: compareBooks,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

export function createTeachersProvider(deps: CollectionDeps): CollectionProvider<Teacher, TeacherRow, NoFilters> {
  return new CollectionProvider<Teacher, TeacherRow, NoFilters>(
    {
      name: 'teachers',
      fetchRemote: ({ search }) => deps.api.getTeachers({ search }),
      queryCache: ({ search }) => deps.cache.teachers.queryAll({}, { search }),
      fromRow: row => deps.cache.teachers.fromRow(row),
      compare: byName,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

export function createSeriesProvider(deps: CollectionDeps): CollectionProvider<Series, SeriesRow, SeriesFilters> {
  return new CollectionProvider<Series, SeriesRow, SeriesFilters>(
    {
      name: 'series',
      fetchRemote: async ({ filters, search, limit }) =>
        (
          await deps.api.getSeries({
            search,
            limit,
            themeId: filters.theme_id ?? undefined,
            bookId: filters.book_id ?? undefined,
            teacherId: filters.teacher_id ?? undefined,
          })
        ).items,
      queryCache: ({ filters, search }) => deps.cache.series.queryAll(filters, { search }),
      fromRow: row => deps.cache.series.fromRow(row),
      compare: compareSeries,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

/**
 * Lessons of one series when `series_id` is set, otherwise the lesson list.
 * The series endpoint does not search, so the query is applied here.
 */
export function createLessonsProvider(deps: CollectionDeps): CollectionProvider<Lesson, LessonRow, LessonFilters> {
  return new CollectionProvider<Lesson, LessonRow, LessonFilters>(
    {
      name: 'lessons',
      fetchRemote: async ({ filters, search, limit }) => {
        if (filters.series_id !== undefined && filters.series_id !== null) {
          const lessons = await deps.api.getSeriesLessons(filters.series_id);
          return lessons.filter(lesson => matchesSearch(search, lesson.title, lesson.display_title));
        }
        return (await deps.api.getLessons({ search, limit })).items;
      },
      queryCache: ({ filters, search }) => deps.cache.lessons.queryAll(filters, { search }),
      fromRow: row => deps.cache.lessons.fromRow(row),
      compare: compareLessons,
    },
    { pageSize: deps.pageSize, initialFilters: {}, onReachability: deps.onReachability }
  );
}

export interface CatalogCollections {
  themes: CollectionProvider<Theme, ThemeRow, NoFilters>;
  bookAuthors: CollectionProvider<BookAuthor, BookAuthorRow, NoFilters>;
  books: CollectionProvider<Book, BookRow, BookFilters>;
  teachers: CollectionProvider<Teacher, TeacherRow, NoFilters>;
  series: CollectionProvider<Series, SeriesRow, SeriesFilters>;
  lessons: CollectionProvider<Lesson, LessonRow, LessonFilters>;
}

/**
 * The collections as the UI sees them, without the cache row types.
 */
export interface CatalogHandles {
  themes: CollectionHandle<Theme, NoFilters>;
  bookAuthors: CollectionHandle<BookAuthor, NoFilters>;
  books: CollectionHandle<Book, BookFilters>;
  teachers: CollectionHandle<Teacher, NoFilters>;
  series: CollectionHandle<Series, SeriesFilters>;
  lessons: CollectionHandle<Lesson, LessonFilters>;
}

export function createCatalogCollections(deps: CollectionDeps): CatalogCollections {
  return {
    themes: createThemesProvider(deps),
    bookAuthors: createBookAuthorsProvider(deps),
    books: createBooksProvider(deps),
    teachers: createTeachersProvider(deps),
    series: createSeriesProvider(deps),
    lessons: createLessonsProvider(deps),
  };
}

// ============ Offline Library ============

/**
 * Collections limited to downloaded content. They never call the server.
 */
export function createOfflineLibrary(deps: Pick<CollectionDeps, 'cache' | 'pageSize'>): CatalogCollections {
  const { cache, pageSize } = deps;
  return {
    themes: new CollectionProvider<Theme, ThemeRow, NoFilters>(
      {
        name: 'offline-themes',
        fetchRemote: null,
        queryCache: ({ search }) => cache.themes.queryWithActiveDescendant({}, { search }),
        fromRow: row => cache.themes.fromRow(row),
        compare: compareThemes,
      },
      { pageSize, initialFilters: {} }
    ),
    bookAuthors: new CollectionProvider<BookAuthor, BookAuthorRow, NoFilters>(
      {
        name: 'offline-book-authors',
        fetchRemote: null,
        queryCache: ({ search }) => cache.bookAuthors.queryWithActiveDescendant({}, { search }),
        fromRow: row => cache.bookAuthors.fromRow(row),
        compare: byName,
      },
      { pageSize, initialFilters: {} }
    ),
    books: new CollectionProvider<Book, BookRow, BookFilters>(
      {
        name: 'offline-books',
        fetchRemote: null,
        queryCache: ({ filters, search }) => cache.books.queryWithActiveDescendant(filters, { search }),
        fromRow: row => cache.books.fromRow(row),
        compare: compareBooks,
      },
      { pageSize, initialFilters: {} }
    ),
    teachers: new CollectionProvider<Teacher, TeacherRow, NoFilters>(
      {
        name: 'offline-teachers',
        fetchRemote: null,
        queryCache: ({ search }) => cache.teachers.queryWithActiveDescendant({}, { search }),
        fromRow: row => cache.teachers.fromRow(row),
        compare: byName,
      },
      { pageSize, initialFilters: {} }
    ),
    series: new CollectionProvider<Series, SeriesRow, SeriesFilters>(
      {
        name: 'offline-series',
        fetchRemote: null,
        queryCache: ({ filters, search }) => cache.series.queryWithActiveDescendant(filters, { search }),
        fromRow: row => cache.series.fromRow(row),
        compare: compareSeries,
      },
      { pageSize, initialFilters: {} }
    ),
    lessons: new CollectionProvider<Lesson, LessonRow, LessonFilters>(
      {
        name: 'offline-lessons',
        fetchRemote: null,
        queryCache: ({ filters, search }) => cache.lessons.queryWithActiveDescendant(filters, { search }),
        fromRow: row => cache.lessons.fromRow(row),
        compare: compareLessons,
      },
      { pageSize, initialFilters: {} }
    ),
  };
}
