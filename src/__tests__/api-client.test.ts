/**
 * API Client Tests
 */

import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ApiClient, type FetchLike } from '@/api/client';
import {
  ApiError,
  ConnectivityError,
  errorMessage,
  isConnectivityError,
  toConnectivityError,
} from '@/api/errors';
import { loadConfig } from '@/lib/config';
import { jsonResponse } from './fixtures';

const BASE_URL = 'http://api.test';

function createClient(fetchImpl: FetchLike, getAccessToken?: () => string | null) {
  return new ApiClient({ baseUrl: BASE_URL, prefix: '/api', timeoutMs: 1000, fetch: fetchImpl, getAccessToken });
}

const requestedUrl = (fetchMock: Mock<FetchLike>, call = 0): string =>
  String(fetchMock.mock.calls[call]?.[0]);

describe('ApiClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('requests', () => {
    it('builds list URLs from the given parameters only', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ items: [], total: 0 }));
      const client = createClient(fetchMock);

      await client.getThemes({ search: 'calm', limit: 5 });
      await client.getSeries({ themeId: 2, includeInactive: true, skip: 0 });

      expect(requestedUrl(fetchMock, 0)).toBe('http://api.test/api/themes?search=calm&limit=5');
      expect(requestedUrl(fetchMock, 1)).toBe('http://api.test/api/series?skip=0&include_inactive=true&theme_id=2');
    });

    it('sends JSON accept and bearer headers', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse([]));
      const client = createClient(fetchMock, () => 'test-token');

      await client.getTeachers();

      expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
        method: 'GET',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
      });
    });

    it('leaves out the authorization header without a token', async () => {
      const client = createClient(vi.fn<FetchLike>(), () => null);

      expect(await client.authHeaders()).toEqual({});
    });
  });

  describe('responses', () => {
    it('fills defaults for missing optional fields', async () => {
      const client = createClient(async () => jsonResponse({ items: [{ id: 3, name: 'Breath' }], total: 1 }));

      expect(await client.getThemes()).toEqual({
        items: [{ id: 3, name: 'Breath', description: null, sort_order: 0, is_active: true }],
        total: 1,
      });
    });

    it('takes parent ids from nested objects', async () => {
      const client = createClient(async () =>
        jsonResponse([{ id: 1, name: 'Notes', theme: { id: 4, name: 'Nature' }, author_id: 9 }])
      );

      const page = await client.getBooks();

      expect(page.items[0]).toMatchObject({ theme_id: 4, author_id: 9 });
      expect(page.total).toBe(1);
    });

    it('adds the series id to series lessons and encodes waveforms as text', async () => {
      const fetchMock = vi.fn<FetchLike>(async () =>
        jsonResponse({ items: [{ id: 7, title: 'Intro', lesson_number: 1, waveform_data: [0.1, 0.5] }] })
      );
      const client = createClient(fetchMock);

      const lessons = await client.getSeriesLessons(3);

      expect(requestedUrl(fetchMock)).toBe('http://api.test/api/series/3/lessons');
      expect(lessons).toHaveLength(1);
      expect(lessons[0]).toMatchObject({ id: 7, series_id: 3, waveform_data: '[0.1,0.5]', audio_url: null });
    });

    it('rejects payloads of the wrong shape', async () => {
      const client = createClient(async () => jsonResponse({ items: [{ id: 'one' }] }));

      const error = await client.getTeachers().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 200, message: 'Unexpected response from server' });
    });
  });

  describe('errors', () => {
    it('uses the detail text of an error body', async () => {
      const client = createClient(async () => jsonResponse({ detail: 'Series not found' }, 404));

      await expect(client.getSeriesLessons(99)).rejects.toMatchObject({ status: 404, message: 'Series not found' });
    });

    it('falls back to the status when the body is not JSON', async () => {
      const client = createClient(async () => new Response('gateway exploded', { status: 502 }));

      await expect(client.getThemes()).rejects.toMatchObject({
        name: 'ApiError',
        status: 502,
        message: 'Request failed with status 502',
      });
    });

    it('maps a refused connection to a ConnectivityError', async () => {
      const client = createClient(async () => {
        throw new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
      });

      await expect(client.getThemes()).rejects.toMatchObject({
        name: 'ConnectivityError',
        kind: 'refused',
        message: 'Connection failed (ECONNREFUSED)',
      });
    });

    it('aborts requests that exceed the timeout', async () => {
      const client = new ApiClient({
        baseUrl: BASE_URL,
        prefix: '/api',
        timeoutMs: 10,
        fetch: (_input, init) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
            });
          }),
      });

      await expect(client.getThemes()).rejects.toMatchObject({ kind: 'timeout', message: 'Request timed out' });
    });
  });

  describe('response bodies', () => {
    const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

    it('maps a body that breaks off to a ConnectivityError', async () => {
      const client = createClient(
        async () =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                controller.enqueue(encode('{"items":['));
                controller.error(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));
              },
            })
          )
      );

      await expect(client.getThemes()).rejects.toMatchObject({ name: 'ConnectivityError', kind: 'reset' });
    });

    it('times out a body that stalls after the headers', async () => {
      const client = new ApiClient({
        baseUrl: BASE_URL,
        prefix: '/api',
        timeoutMs: 10,
        fetch: async (_input, init) =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                controller.enqueue(encode('['));
                init?.signal?.addEventListener('abort', () =>
                  controller.error(new DOMException('The operation was aborted', 'AbortError'))
                );
              },
            })
          ),
      });

      await expect(client.getThemes()).rejects.toMatchObject({ kind: 'timeout', message: 'Request timed out' });
    });
  });

  describe('downloads', () => {
    const client = createClient(vi.fn<FetchLike>());

    it('resolves audio paths against the server', () => {
      expect(client.downloadUrl('https://cdn.test/a.mp3')).toBe('https://cdn.test/a.mp3');
      expect(client.downloadUrl('/api/media/a.mp3')).toBe('http://api.test/api/media/a.mp3');
      expect(client.downloadUrl('media/a.mp3')).toBe('http://api.test/api/media/a.mp3');
      expect(client.downloadUrl('/media/a.mp3')).toBe('http://api.test/api/media/a.mp3');
    });

    it('rejects a download the server refuses', async () => {
      const refusing = createClient(async () => new Response(null, { status: 403 }));

      await expect(refusing.openDownload('http://api.test/a.mp3', new AbortController().signal)).rejects.toMatchObject({
        status: 403,
        message: 'Download failed with status 403',
      });
    });

    it('passes the caller signal to fetch', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => new Response('ok'));
      const controller = new AbortController();

      await createClient(fetchMock).openDownload('http://api.test/a.mp3', controller.signal);

      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    });
  });

  it('is built from the application configuration', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse([]));
    const config = loadConfig({ apiBaseUrl: 'http://catalog.test/', apiPrefix: '/v2' }, {});

    await ApiClient.fromConfig(config, { fetch: fetchMock }).getThemes();

    expect(requestedUrl(fetchMock)).toBe('http://catalog.test/v2/themes');
  });
});

describe('connectivity classification', () => {
  it('maps socket error codes to kinds', () => {
    const dns = Object.assign(new Error('getaddrinfo ENOTFOUND api.test'), { code: 'ENOTFOUND' });
    const reset = new TypeError('fetch failed', {
      cause: Object.assign(new Error('other side closed'), { code: 'UND_ERR_SOCKET' }),
    });

    expect(toConnectivityError(dns)?.kind).toBe('dns');
    expect(toConnectivityError(reset)?.kind).toBe('reset');
  });

  it('treats a bare fetch failure as a network error', () => {
    expect(toConnectivityError(new TypeError('fetch failed'))).toMatchObject({
      kind: 'network',
      message: 'Network request failed',
    });
  });

  it('returns the same error when already classified', () => {
    const error = new ConnectivityError('timeout', 'Request timed out');

    expect(toConnectivityError(error)).toBe(error);
  });

  it('does not classify server rejections or programming errors', () => {
    expect(isConnectivityError(new ApiError(500, 'boom'))).toBe(false);
    expect(isConnectivityError(new TypeError('undefined is not a function'))).toBe(false);
    expect(isConnectivityError('offline')).toBe(false);
  });

  it('extracts readable messages', () => {
    expect(errorMessage(new Error('broken'))).toBe('broken');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('Unknown error');
    expect(errorMessage(null, 'Nothing')).toBe('Nothing');
  });
});
