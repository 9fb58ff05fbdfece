/**
 * Application Configuration
 *
 * Reads the data layer settings from the environment and explicit overrides,
 * validated with zod. Defaults match a local development backend.
 */

import { z } from 'zod';

export const DEFAULT_API_URL = 'http://localhost:8000';
export const MEMORY_DATABASE = ':memory:';

const ConfigSchema = z.object({
  apiBaseUrl: z.string().url().default(DEFAULT_API_URL),
  apiPrefix: z.string().startsWith('/').default('/api'),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  databasePath: z.string().min(1).default('lessons.db'),
  downloadDir: z.string().min(1).default('downloaded_lessons'),
  schemaVersion: z.number().int().min(1).default(3),
  listPageSize: z.number().int().min(1).max(1000).default(1000),
  batchChunkSize: z.number().int().min(1).default(50),
  connectivityCacheSeconds: z.number().int().min(0).default(5),
  /** Background probe interval; 0 turns periodic probing off. */
  connectivityCheckIntervalMs: z.number().int().min(0).default(30_000),
  restoreRefreshDelayMs: z.number().int().min(0).default(2000),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;
export type ConfigOverrides = z.input<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function fromEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  const values: ConfigOverrides = {};
  if (env.LESSONS_API_URL) values.apiBaseUrl = env.LESSONS_API_URL;
  if (env.LESSONS_API_TIMEOUT_MS) values.requestTimeoutMs = Number(env.LESSONS_API_TIMEOUT_MS);
  if (env.LESSONS_DB_PATH) values.databasePath = env.LESSONS_DB_PATH;
  if (env.LESSONS_DOWNLOAD_DIR) values.downloadDir = env.LESSONS_DOWNLOAD_DIR;
  return values;
}

/**
 * Build the configuration. Explicit overrides win over environment variables.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const result = ConfigSchema.safeParse({ ...fromEnvironment(env), ...overrides });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

/**
 * Check if the API points somewhere other than the development default.
 */
export function isApiConfigured(config: AppConfig): boolean {
  if (config.apiBaseUrl === DEFAULT_API_URL) {
    console.warn('[Config] API URL not configured, using', DEFAULT_API_URL);
    return false;
  }
  return true;
}

/**
 * Base URL including the API prefix, without a trailing slash.
 */
export function apiRoot(config: Pick<AppConfig, 'apiBaseUrl' | 'apiPrefix'>): string {
  return `${config.apiBaseUrl.replace(/\/+$/, '')}${config.apiPrefix}`;
}
