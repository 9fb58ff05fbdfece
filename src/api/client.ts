/**
 * ApiClient
 *
 * Typed access to the catalog REST API. Every response is validated with zod
 * and transport failures are mapped to ConnectivityError so callers can tell
 * "server unreachable" apart from "server said no".
 */

import { z } from 'zod';
import { apiRoot, type AppConfig } from '@/lib/config';
import type { Book, BookAuthor, Lesson, Paginated, Series, Teacher, Theme } from '@/lib/types';
import { ApiError, toConnectivityError } from './errors';
import {
  BookAuthorSchema,
  BookSchema,
  ErrorBodySchema,
  LessonSchema,
  SeriesSchema,
  TeacherSchema,
  ThemeSchema,
  paginated,
} from './schemas';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type AccessTokenGetter = () => string | null | Promise<string | null>;

export interface ApiClientOptions {
  baseUrl: string;
  prefix: string;
  timeoutMs: number;
  fetch?: FetchLike;
  getAccessToken?: AccessTokenGetter;
}

export interface ListParams {
  search?: string;
  skip?: number;
  limit?: number;
  includeInactive?: boolean;
}

export interface BookListParams extends ListParams {
  themeId?: number;
  authorId?: number;
}

export interface SeriesListParams extends ListParams {
  themeId?: number;
  bookId?: number;
  teacherId?: number;
  year?: number;
}

export interface LessonListParams extends ListParams {
  seriesId?: number;
  teacherId?: number;
  bookId?: number;
  themeId?: number;
}

type QueryValue = string | number | boolean | undefined;

function listQuery(params: ListParams): Record<string, QueryValue> {
  return {
    search: params.search || undefined,
    skip: params.skip,
    limit: params.limit,
    include_inactive: params.includeInactive || undefined,
  };
}

export class ApiClient {
  private readonly root: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ApiClientOptions) {
    this.root = apiRoot({ apiBaseUrl: options.baseUrl, apiPrefix: options.prefix });
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  static fromConfig(
    config: AppConfig,
    extras: Pick<ApiClientOptions, 'fetch' | 'getAccessToken'> = {}
  ): ApiClient {
    return new ApiClient({
      baseUrl: config.apiBaseUrl,
      prefix: config.apiPrefix,
      timeoutMs: config.requestTimeoutMs,
      ...extras,
    });
  }

  // ============ Catalog ============

  getThemes(params: ListParams = {}): Promise<Paginated<Theme>> {
    return this.get('/themes', listQuery(params), paginated(ThemeSchema));
  }

  getBookAuthors(params: ListParams = {}): Promise<Paginated<BookAuthor>> {
    return this.get('/book-authors', listQuery(params), paginated(BookAuthorSchema));
  }

  getBooks(params: BookListParams = {}): Promise<Paginated<Book>> {
    return this.get(
      '/books',
      { ...listQuery(params), theme_id: params.themeId, author_id: params.authorId },
      paginated(BookSchema)
    );
  }

  async getTeachers(params: ListParams = {}): Promise<Teacher[]> {
    const page = await this.get('/teachers', listQuery(params), paginated(TeacherSchema));
    return page.items;
  }

  getSeries(params: SeriesListParams = {}): Promise<Paginated<Series>> {
    return this.get(
      '/series',
      {
        ...listQuery(params),
        theme_id: params.themeId,
        book_id: params.bookId,
        teacher_id: params.teacherId,
        year: params.year,
      },
      paginated(SeriesSchema)
    );
  }

  /**
   * Lessons of one series ordered by lesson number. The endpoint omits the
   * series id on each item, so it is filled in from the request.
   */
  async getSeriesLessons(seriesId: number): Promise<Lesson[]> {
    const page = await this.get(`/series/${seriesId}/lessons`, {}, paginated(LessonSchema));
    return page.items.map(lesson => ({ ...lesson, series_id: lesson.series_id ?? seriesId }));
  }

  getLessons(params: LessonListParams = {}): Promise<Paginated<Lesson>> {
    return this.get(
      '/lessons',
      {
        ...listQuery(params),
        series_id: params.seriesId,
        teacher_id: params.teacherId,
        book_id: params.bookId,
        theme_id: params.themeId,
      },
      paginated(LessonSchema)
    );
  }

  /**
   * Absolute URL for an audio path. Relative paths resolve against the API root.
   */
  downloadUrl(audioUrl: string): string {
    if (/^https?:\/\//i.test(audioUrl)) return audioUrl;
    if (audioUrl.startsWith(this.options.prefix + '/')) {
      return `${this.options.baseUrl.replace(/\/+$/, '')}${audioUrl}`;
    }
    return `${this.root}/${audioUrl.replace(/^\/+/, '')}`;
  }

  /**
   * Headers for authenticated requests, shared with the download engine.
   */
  async authHeaders(): Promise<Record<string, string>> {
    const token = this.options.getAccessToken ? await this.options.getAccessToken() : null;
    return token ? { Authorization: `Bearer ${token}` } : {};
  }

  /**
   * Open a binary download. The caller owns the signal; no request timeout
   * applies because the body may stream for minutes.
   */
  async openDownload(url: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: await this.authHeaders(), signal });
    } catch (error) {
      throw toConnectivityError(error) ?? error;
    }

    if (!response.ok) {
      throw new ApiError(response.status, `Download failed with status ${response.status}`);
    }
    return response;
  }

  // ============ Transport ============

  private async get<T>(
    path: string,
    query: Record<string, QueryValue>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const url = new URL(`${this.root}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const { ok, status, body } = await this.send(url.toString());

    if (!ok) {
      throw toApiError(status, body);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      console.error('[Api] Unexpected response shape for', path, parsed.error.issues);
      throw new ApiError(status, 'Unexpected response from server', parsed.error.issues);
    }
    return parsed.data;
  }

  /**
   * GET and read the whole body under one timeout. A body that is not JSON
   * reads as null; a body that breaks off is a connectivity failure.
   */
  private async send(url: string): Promise<{ ok: boolean; status: number; body: unknown }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...(await this.authHeaders()) },
        signal: controller.signal,
      });
      const text = await response.text();
      return { ok: response.ok, status: response.status, body: parseJson(text) };
    } catch (error) {
      const connectivity = toConnectivityError(error);
      if (connectivity) {
        console.warn(`[Api] ${connectivity.kind} error for ${url}`);
        throw connectivity;
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function toApiError(status: number, body: unknown): ApiError {
  const parsed = ErrorBodySchema.safeParse(body);
  const detail = parsed.success ? parsed.data.detail : undefined;
  const message =
    (parsed.success && typeof parsed.data.detail === 'string' && parsed.data.detail) ||
    (parsed.success && parsed.data.message) ||
    `Request failed with status ${status}`;
  return new ApiError(status, message, detail);
}
