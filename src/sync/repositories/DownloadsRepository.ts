/**
 * DownloadsRepository
 *
 * The download ledger: one row per lesson the user asked to keep offline.
 * Only the download engine writes here. Every mutation is announced to
 * subscribers so progress views and badges can follow along.
 */

import { z } from 'zod';
import { LessonSchema } from '@/api/schemas';
import type { SqlParam, SqlRow, Store } from '@/lib/database';
import { parseDownloadStatus, type DownloadStatus, type DownloadedAsset, type Lesson } from '@/lib/types';
import { DOWNLOADS_TABLE } from '../types';

const DownloadRowSchema = z.object({
  lesson_id: z.number().int(),
  file_path: z.string(),
  file_size: z.number().int(),
  download_date: z.string(),
  status: z.string(),
  series_id: z.number().int().nullable(),
  lesson_data: z.string().nullable(),
});

type DownloadRow = z.infer<typeof DownloadRowSchema>;

export interface DownloadRecord {
  lesson_id: number;
  file_path: string;
  file_size: number;
  status: DownloadStatus;
  series_id: number | null;
  lesson: Lesson | null;
  download_date?: string;
}

export type LedgerEvent =
  | { type: 'upserted'; lessonId: number; status: DownloadStatus }
  | { type: 'status'; lessonId: number; status: DownloadStatus }
  | { type: 'deleted'; lessonId: number }
  | { type: 'purged' };

export type LedgerListener = (event: LedgerEvent) => void;

function parseSnapshot(lessonId: number, lessonData: string | null): Lesson | null {
  if (!lessonData) return null;
  try {
    const parsed = LessonSchema.safeParse(JSON.parse(lessonData));
    if (parsed.success) return parsed.data;
    console.warn(`[Downloads] Unreadable lesson snapshot for ${lessonId}:`, parsed.error.issues[0]?.message);
  } catch (error) {
    console.warn(`[Downloads] Invalid lesson snapshot JSON for ${lessonId}:`, error);
  }
  return null;
}

function toAsset(raw: SqlRow): DownloadedAsset {
  const row: DownloadRow = DownloadRowSchema.parse(raw);
  return {
    lesson_id: row.lesson_id,
    file_path: row.file_path,
    file_size: row.file_size,
    download_date: row.download_date,
    status: parseDownloadStatus(row.status),
    series_id: row.series_id,
    lesson: parseSnapshot(row.lesson_id, row.lesson_data),
  };
}

export class DownloadsRepository {
  private listeners: Set<LedgerListener> = new Set();

  constructor(private readonly store: Store) {}

  // ============ Observable Pattern ============

  /**
   * Subscribe to ledger mutations.
   */
  subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notifyListeners(event: LedgerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[Downloads] Error in ledger listener:', error);
      }
    }
  }

  // ============ Write Operations ============

  /**
   * Insert or replace the record for a lesson.
   */
  async upsert(record: DownloadRecord): Promise<void> {
    const params: SqlParam[] = [
      record.lesson_id,
      record.file_path,
      record.file_size,
      record.download_date ?? new Date().toISOString(),
      record.status,
      record.series_id,
      record.lesson ? JSON.stringify(record.lesson) : null,
    ];
    await this.store.execute(
      `INSERT OR REPLACE INTO ${DOWNLOADS_TABLE}
        (lesson_id, file_path, file_size, download_date, status, series_id, lesson_data)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      params
    );
    this.notifyListeners({ type: 'upserted', lessonId: record.lesson_id, status: record.status });
  }

  /**
   * Change the status of an existing record. Returns false when there is none.
   */
  async setStatus(lessonId: number, status: DownloadStatus): Promise<boolean> {
    const { rowsAffected } = await this.store.execute(
      `UPDATE ${DOWNLOADS_TABLE} SET status = $1 WHERE lesson_id = $2`,
      [status, lessonId]
    );
    if (rowsAffected === 0) return false;

    this.notifyListeners({ type: 'status', lessonId, status });
    return true;
  }

  async delete(lessonId: number): Promise<boolean> {
    const { rowsAffected } = await this.store.execute(`DELETE FROM ${DOWNLOADS_TABLE} WHERE lesson_id = $1`, [
      lessonId,
    ]);
    if (rowsAffected === 0) return false;

    this.notifyListeners({ type: 'deleted', lessonId });
    return true;
  }

  async purgeAll(): Promise<number> {
    const { rowsAffected } = await this.store.execute(`DELETE FROM ${DOWNLOADS_TABLE}`);
    this.notifyListeners({ type: 'purged' });
    return rowsAffected;
  }

  // ============ Read Operations ============

  async getById(lessonId: number): Promise<DownloadedAsset | null> {
    try {
      const rows = await this.store.select(`SELECT * FROM ${DOWNLOADS_TABLE} WHERE lesson_id = $1`, [lessonId]);
      return rows.length > 0 ? toAsset(rows[0]) : null;
    } catch (error) {
      console.error(`[Downloads] Failed to read record ${lessonId}:`, error);
      return null;
    }
  }

  /**
   * All records, newest first, optionally limited to one status.
   */
  async getAll(status?: DownloadStatus): Promise<DownloadedAsset[]> {
    const whereClause = status ? 'WHERE status = $1' : '';
    try {
      const rows = await this.store.select(
        `SELECT * FROM ${DOWNLOADS_TABLE} ${whereClause} ORDER BY download_date DESC, lesson_id ASC`,
        status ? [status] : []
      );
      return rows.map(toAsset);
    } catch (error) {
      console.error('[Downloads] Failed to read records:', error);
      return [];
    }
  }

  /**
   * Offline snapshots of the completed lessons of a series, by lesson number.
   */
  async getCompletedForSeries(seriesId: number): Promise<Lesson[]> {
    const assets = await this.queryCompleted('AND series_id = $2', [seriesId]);
    return assets
      .flatMap(asset => (asset.lesson ? [asset.lesson] : []))
      .sort((a, b) => a.lesson_number - b.lesson_number);
  }

  async isDownloaded(lessonId: number): Promise<boolean> {
    const asset = await this.getById(lessonId);
    return asset !== null && asset.status === 'completed' && asset.file_path !== '';
  }

  async totalCompletedBytes(): Promise<number> {
    return this.scalar(`SELECT COALESCE(SUM(file_size), 0) AS value FROM ${DOWNLOADS_TABLE} WHERE status = $1`);
  }

  async completedCount(): Promise<number> {
    return this.scalar(`SELECT COUNT(*) AS value FROM ${DOWNLOADS_TABLE} WHERE status = $1`);
  }

  async hasAnyCompleted(): Promise<boolean> {
    return (await this.completedCount()) > 0;
  }

  private async queryCompleted(extraClause: string, params: SqlParam[]): Promise<DownloadedAsset[]> {
    try {
      const rows = await this.store.select(
        `SELECT * FROM ${DOWNLOADS_TABLE} WHERE status = $1 ${extraClause}`,
        ['completed', ...params]
      );
      return rows.map(toAsset);
    } catch (error) {
      console.error('[Downloads] Failed to read completed records:', error);
      return [];
    }
  }

  private async scalar(sql: string): Promise<number> {
    try {
      const [row] = await this.store.select(sql, ['completed']);
      return typeof row?.value === 'number' ? row.value : 0;
    } catch (error) {
      console.error('[Downloads] Failed to aggregate records:', error);
      return 0;
    }
  }
}
