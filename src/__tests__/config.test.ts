/**
 * Configuration Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { ConfigError, DEFAULT_API_URL, apiRoot, isApiConfigured, loadConfig } from '@/lib/config';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({}, {})).toEqual({
      apiBaseUrl: DEFAULT_API_URL,
      apiPrefix: '/api',
      requestTimeoutMs: 30_000,
      databasePath: 'lessons.db',
      downloadDir: 'downloaded_lessons',
      schemaVersion: 3,
      listPageSize: 1000,
      batchChunkSize: 50,
      connectivityCacheSeconds: 5,
      connectivityCheckIntervalMs: 30_000,
      restoreRefreshDelayMs: 2000,
    });
  });

  it('reads environment variables', () => {
    const config = loadConfig(
      {},
      {
        LESSONS_API_URL: 'https://catalog.test',
        LESSONS_API_TIMEOUT_MS: '5000',
        LESSONS_DB_PATH: '/data/cache.db',
        LESSONS_DOWNLOAD_DIR: '/data/audio',
      }
    );

    expect(config).toMatchObject({
      apiBaseUrl: 'https://catalog.test',
      requestTimeoutMs: 5000,
      databasePath: '/data/cache.db',
      downloadDir: '/data/audio',
    });
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ databasePath: ':memory:' }, { LESSONS_DB_PATH: '/data/cache.db' });

    expect(config.databasePath).toBe(':memory:');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}, {}))).toBe(true);
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ apiPrefix: 'api', batchChunkSize: 0 }, { LESSONS_API_TIMEOUT_MS: 'soon' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues.map(issue => issue.split(':')[0]) : [];
    expect(issues.sort()).toEqual(['apiPrefix', 'batchChunkSize', 'requestTimeoutMs']);
  });
});

describe('apiRoot', () => {
  it('joins the base URL and prefix without doubled slashes', () => {
    expect(apiRoot({ apiBaseUrl: 'https://catalog.test///', apiPrefix: '/api' })).toBe('https://catalog.test/api');
  });
});

describe('isApiConfigured', () => {
  it('warns while the development default is in use', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(isApiConfigured(loadConfig({}, {}))).toBe(false);
    expect(isApiConfigured(loadConfig({ apiBaseUrl: 'https://catalog.test' }, {}))).toBe(true);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
