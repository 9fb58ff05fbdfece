/**
 * DownloadService
 *
 * Fetches lesson audio to local files and keeps the download ledger in step.
 *
 * Each call to download() yields progress events and ends with exactly one
 * terminal event (completed or failed). The ledger row is written before the
 * terminal event is emitted, so a consumer that sees `completed` can read
 * the record back. Pause, resume and cancel are cooperative: the transfer
 * checks its flags before every chunk read.
 */

import { access, mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '@/api/errors';
import type { DownloadStatus, Lesson } from '@/lib/types';
import type { DownloadRecord, DownloadsRepository } from '../repositories/DownloadsRepository';
import { createDeferred, ProgressChannel, type Deferred } from './ProgressChannel';

export interface DownloadProgress {
  lessonId: number;
  bytesDownloaded: number;
  bytesTotal: number;
  /** 0..1, or 0 while the total size is unknown. */
  progress: number;
  status: DownloadStatus;
  /** Set on the final event of a transfer the user cancelled. */
  cancelled?: boolean;
  error?: string;
}

export type PlaybackSource = { kind: 'local'; path: string } | { kind: 'stream'; url: string };

/**
 * Where audio comes from. ApiClient satisfies this.
 */
export interface DownloadSource {
  downloadUrl(audioUrl: string): string;
  openDownload(url: string, signal: AbortSignal): Promise<Response>;
}

export interface DownloadServiceOptions {
  downloadDir: string;
}

// Legal status changes of a download in flight. A fresh download() call
// replaces a failed record with a new pending one.
export const DOWNLOAD_TRANSITIONS: Record<DownloadStatus, readonly DownloadStatus[]> = {
  pending: ['downloading', 'failed'],
  downloading: ['completed', 'failed', 'paused'],
  paused: ['downloading', 'failed'],
  failed: ['pending'],
  completed: [],
};

export function canTransition(from: DownloadStatus, to: DownloadStatus): boolean {
  return DOWNLOAD_TRANSITIONS[from].includes(to);
}

export class DownloadStateError extends Error {
  constructor(
    readonly lessonId: number,
    message: string
  ) {
    super(message);
    this.name = 'DownloadStateError';
  }
}

class DownloadCancelledError extends Error {
  constructor(readonly lessonId: number) {
    super(`Download of lesson ${lessonId} was cancelled`);
    this.name = 'DownloadCancelledError';
  }
}

interface ActiveTransfer {
  lessonId: number;
  status: DownloadStatus;
  controller: AbortController;
  cancelled: boolean;
  pauseRequested: boolean;
  resumeGate: Deferred<void> | null;
  settled: Deferred<void>;
  last: DownloadProgress | null;
  finished: boolean;
}

/**
 * Human readable size with one decimal, e.g. "1.5 MB".
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

function progressEvent(
  lessonId: number,
  bytesDownloaded: number,
  bytesTotal: number,
  status: DownloadStatus,
  extra: Pick<DownloadProgress, 'cancelled' | 'error'> = {}
): DownloadProgress {
  return {
    lessonId,
    bytesDownloaded,
    bytesTotal,
    progress: bytesTotal > 0 ? Math.min(1, bytesDownloaded / bytesTotal) : 0,
    status,
    ...extra,
  };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class DownloadService {
  private readonly activeDownloads = new Map<number, ActiveTransfer>();

  constructor(
    private readonly ledger: DownloadsRepository,
    private readonly source: DownloadSource,
    private readonly options: DownloadServiceOptions
  ) {}

  filePathFor(lessonId: number): string {
    return join(this.options.downloadDir, `lesson_${lessonId}.mp3`);
  }

  isActive(lessonId: number): boolean {
    return this.activeDownloads.has(lessonId);
  }

  // ============ Transfers ============

  /**
   * Download a lesson's audio, yielding progress until a terminal event.
   */
  async *download(lesson: Lesson): AsyncGenerator<DownloadProgress, void, undefined> {
    if (this.activeDownloads.has(lesson.id)) {
      throw new DownloadStateError(lesson.id, `Lesson ${lesson.id} is already downloading`);
    }
    // Claim the lesson before the first await so a concurrent call is refused
    const transfer = this.reserve(lesson.id);

    const existing = await this.ledger.getById(lesson.id);
    if (existing?.status === 'completed' && (await fileExists(existing.file_path))) {
      this.release(transfer);
      yield progressEvent(lesson.id, existing.file_size, existing.file_size, 'completed');
      return;
    }

    if (!lesson.audio_url) {
      const event = await this.recordMissingAudio(lesson);
      this.release(transfer);
      yield event;
      return;
    }

    const channel = new ProgressChannel<DownloadProgress>();
    this.startTransfer(transfer, lesson, this.source.downloadUrl(lesson.audio_url), channel);
    yield* channel;
  }

  /**
   * Ask a running transfer to pause before its next chunk.
   */
  pause(lessonId: number): boolean {
    const transfer = this.activeDownloads.get(lessonId);
    if (!transfer || !canTransition(transfer.status, 'paused')) return false;
    transfer.pauseRequested = true;
    return true;
  }

  resume(lessonId: number): boolean {
    const transfer = this.activeDownloads.get(lessonId);
    if (!transfer || !(transfer.pauseRequested || transfer.resumeGate)) return false;
    transfer.pauseRequested = false;
    transfer.resumeGate?.resolve();
    return true;
  }

  /**
   * Abort a transfer and remove its partial file and ledger row. Resolves once
   * the cleanup is done. A record left behind by an earlier run is removed too.
   */
  async cancel(lessonId: number): Promise<boolean> {
    const transfer = this.activeDownloads.get(lessonId);
    if (transfer) {
      transfer.cancelled = true;
      transfer.controller.abort();
      transfer.resumeGate?.resolve();
      await transfer.settled.promise;
      return true;
    }

    const record = await this.ledger.getById(lessonId);
    if (!record || record.status === 'completed') return false;
    await rm(record.file_path || this.filePathFor(lessonId), { force: true });
    await this.ledger.delete(lessonId);
    return true;
  }

  /**
   * Remove a downloaded file and its record.
   */
  async deleteDownload(lessonId: number): Promise<boolean> {
    if (this.activeDownloads.has(lessonId)) {
      return this.cancel(lessonId);
    }

    const record = await this.ledger.getById(lessonId);
    if (!record) return false;

    await rm(record.file_path || this.filePathFor(lessonId), { force: true });
    const deleted = await this.ledger.delete(lessonId);
    console.log(`[Downloads] Deleted lesson ${lessonId}`);
    return deleted;
  }

  /**
   * Mark records left in flight by a previous run as failed and drop their
   * partial files. Nothing can be transferring for them in this process.
   */
  async recoverInterrupted(): Promise<number> {
    const records = await this.ledger.getAll();
    let recovered = 0;

    for (const record of records) {
      if (record.status === 'completed' || record.status === 'failed') continue;
      if (this.activeDownloads.has(record.lesson_id)) continue;

      await rm(record.file_path || this.filePathFor(record.lesson_id), { force: true });
      await this.ledger.setStatus(record.lesson_id, 'failed');
      recovered++;
    }

    if (recovered > 0) {
      console.log(`[Downloads] Marked ${recovered} interrupted downloads as failed`);
    }
    return recovered;
  }

  // ============ Playback ============

  /**
   * Local path of a completed download whose file is still on disk.
   */
  async getLocalFilePath(lessonId: number): Promise<string | null> {
    const record = await this.ledger.getById(lessonId);
    if (!record || record.status !== 'completed' || !record.file_path) return null;
    return (await fileExists(record.file_path)) ? record.file_path : null;
  }

  isDownloaded(lessonId: number): Promise<boolean> {
    return this.ledger.isDownloaded(lessonId);
  }

  /**
   * Local file when available, otherwise the streaming URL.
   */
  async resolvePlaybackSource(lesson: Lesson): Promise<PlaybackSource | null> {
    const path = await this.getLocalFilePath(lesson.id);
    if (path) return { kind: 'local', path };
    if (!lesson.audio_url) return null;
    return { kind: 'stream', url: this.source.downloadUrl(lesson.audio_url) };
  }

  // ============ Aggregates ============

  getTotalDownloadedSize(): Promise<number> {
    return this.ledger.totalCompletedBytes();
  }

  getDownloadedCount(): Promise<number> {
    return this.ledger.completedCount();
  }

  // ============ Internals ============

  private async recordMissingAudio(lesson: Lesson): Promise<DownloadProgress> {
    const message = 'Lesson has no audio to download';
    try {
      await this.ledger.upsert(this.record(lesson, 'failed', 0));
    } catch (error) {
      console.error(`[Downloads] Failed to record missing audio for lesson ${lesson.id}:`, error);
    }
    return progressEvent(lesson.id, 0, 0, 'failed', { error: message });
  }

  private reserve(lessonId: number): ActiveTransfer {
    const transfer: ActiveTransfer = {
      lessonId,
      status: 'failed',
      controller: new AbortController(),
      cancelled: false,
      pauseRequested: false,
      resumeGate: null,
      settled: createDeferred<void>(),
      last: null,
      finished: false,
    };
    this.activeDownloads.set(lessonId, transfer);
    return transfer;
  }

  private release(transfer: ActiveTransfer): void {
    if (this.activeDownloads.get(transfer.lessonId) === transfer) {
      this.activeDownloads.delete(transfer.lessonId);
    }
    transfer.settled.resolve();
  }

  private startTransfer(
    transfer: ActiveTransfer,
    lesson: Lesson,
    url: string,
    channel: ProgressChannel<DownloadProgress>
  ): void {
    this.runTransfer(transfer, lesson, url, channel)
      .catch(error => {
        console.error(`[Downloads] Transfer of lesson ${lesson.id} crashed:`, error);
        if (transfer.finished) return;
        const bytesDownloaded = transfer.last?.bytesDownloaded ?? 0;
        const bytesTotal = transfer.last?.bytesTotal ?? 0;
        const extra = transfer.cancelled ? { cancelled: true } : { error: errorMessage(error) };
        this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal, 'failed', extra));
      })
      .finally(() => {
        this.release(transfer);
        channel.close();
      });
  }

  private emit(transfer: ActiveTransfer, channel: ProgressChannel<DownloadProgress>, event: DownloadProgress): void {
    transfer.last = event;
    if (event.status === 'completed' || event.status === 'failed') {
      transfer.finished = true;
    }
    channel.push(event);
  }

  private async runTransfer(
    transfer: ActiveTransfer,
    lesson: Lesson,
    url: string,
    channel: ProgressChannel<DownloadProgress>
  ): Promise<void> {
    const filePath = this.filePathFor(lesson.id);
    let handle: FileHandle | null = null;
    let bytesDownloaded = 0;
    let bytesTotal = 0;

    try {
      this.throwIfCancelled(transfer);
      await this.ledger.upsert(this.record(lesson, 'pending', 0));
      transfer.status = 'pending';
      this.emit(transfer, channel, progressEvent(lesson.id, 0, 0, 'pending'));

      await this.transition(transfer, 'downloading');
      this.emit(transfer, channel, progressEvent(lesson.id, 0, 0, 'downloading'));

      this.throwIfCancelled(transfer);
      const response = await this.source.openDownload(url, transfer.controller.signal);
      if (!response.body) {
        throw new Error('Download response has no body');
      }
      bytesTotal = Number(response.headers.get('content-length')) || 0;

      await mkdir(this.options.downloadDir, { recursive: true });
      handle = await open(filePath, 'w');
      const reader = response.body.getReader();

      while (true) {
        if (transfer.pauseRequested) {
          await this.waitWhilePaused(transfer, () =>
            this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal, transfer.status))
          );
        }
        this.throwIfCancelled(transfer);

        const { done, value } = await reader.read();
        if (done) break;

        await handle.write(value);
        bytesDownloaded += value.byteLength;
        this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal, 'downloading'));
      }

      await handle.close();
      handle = null;
      this.throwIfCancelled(transfer);

      // Persist before announcing completion
      this.assertTransition(transfer, 'completed');
      await this.ledger.upsert({ ...this.record(lesson, 'completed', bytesDownloaded), file_path: filePath });
      transfer.status = 'completed';
      console.log(`[Downloads] Lesson ${lesson.id} downloaded (${formatFileSize(bytesDownloaded)})`);
      this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal || bytesDownloaded, 'completed'));
    } catch (error) {
      transfer.controller.abort();
      if (handle) {
        await handle.close().catch(closeError => console.warn('[Downloads] Failed to close partial file:', closeError));
      }
      await rm(filePath, { force: true }).catch(rmError =>
        console.warn(`[Downloads] Failed to remove partial file of lesson ${lesson.id}:`, rmError)
      );

      if (transfer.cancelled) {
        await this.forgetCancelled(transfer);
        console.log(`[Downloads] Lesson ${lesson.id} cancelled`);
        this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal, 'failed', { cancelled: true }));
        return;
      }

      console.error(`[Downloads] Lesson ${lesson.id} failed:`, error);
      await this.persistFailure(transfer);
      this.emit(transfer, channel, progressEvent(lesson.id, bytesDownloaded, bytesTotal, 'failed', { error: errorMessage(error) }));
    }
  }

  private async waitWhilePaused(transfer: ActiveTransfer, emit: () => void): Promise<void> {
    transfer.pauseRequested = false;
    transfer.resumeGate = createDeferred<void>();
    const gate = transfer.resumeGate;

    await this.transition(transfer, 'paused');
    emit();

    await gate.promise;
    transfer.resumeGate = null;
    if (transfer.cancelled) return;

    await this.transition(transfer, 'downloading');
    emit();
  }

  private async transition(transfer: ActiveTransfer, to: DownloadStatus): Promise<void> {
    this.assertTransition(transfer, to);
    await this.ledger.setStatus(transfer.lessonId, to);
    transfer.status = to;
  }

  private assertTransition(transfer: ActiveTransfer, to: DownloadStatus): void {
    if (!canTransition(transfer.status, to)) {
      throw new DownloadStateError(
        transfer.lessonId,
        `Illegal download transition ${transfer.status} -> ${to} for lesson ${transfer.lessonId}`
      );
    }
  }

  private async persistFailure(transfer: ActiveTransfer): Promise<void> {
    try {
      if (canTransition(transfer.status, 'failed')) {
        await this.transition(transfer, 'failed');
      }
    } catch (error) {
      console.error(`[Downloads] Failed to record failure of lesson ${transfer.lessonId}:`, error);
    }
  }

  /**
   * Drop the ledger row of a cancelled transfer, or mark it failed when the
   * row cannot be removed.
   */
  private async forgetCancelled(transfer: ActiveTransfer): Promise<void> {
    try {
      await this.ledger.delete(transfer.lessonId);
    } catch (error) {
      console.error(`[Downloads] Failed to remove record of cancelled lesson ${transfer.lessonId}:`, error);
      await this.persistFailure(transfer);
    }
  }

  private throwIfCancelled(transfer: ActiveTransfer): void {
    if (transfer.cancelled) {
      throw new DownloadCancelledError(transfer.lessonId);
    }
  }

  private record(lesson: Lesson, status: DownloadStatus, fileSize: number): DownloadRecord {
    return {
      lesson_id: lesson.id,
      file_path: this.filePathFor(lesson.id),
      file_size: fileSize,
      status,
      series_id: lesson.series_id,
      lesson,
    };
  }
}
