/**
 * DownloadsProvider
 *
 * UI-facing download state: live progress per lesson and the set of
 * completed downloads. Progress comes from the engine's event stream; the
 * downloaded set is rebuilt from the ledger on start and on every ledger
 * change, so it stays right whichever component changed the ledger.
 */

import { errorMessage } from '@/api/errors';
import type { Lesson } from '@/lib/types';
import type { DownloadsRepository, LedgerEvent } from '@/sync/repositories/DownloadsRepository';
import type { DownloadProgress, DownloadService } from '@/sync/services/DownloadService';

export interface DownloadsState {
  activeDownloads: Record<number, DownloadProgress>;
  downloadedIds: ReadonlySet<number>;
  /** Completed downloads, for badges. */
  badgeCount: number;
  totalBytes: number;
  error: string | null;
}

export type DownloadsListener = (state: DownloadsState) => void;

export class DownloadsProvider {
  private state: DownloadsState = {
    activeDownloads: {},
    downloadedIds: new Set(),
    badgeCount: 0,
    totalBytes: 0,
    error: null,
  };
  private listeners: Set<DownloadsListener> = new Set();
  private unsubscribeLedger: (() => void) | null = null;

  constructor(
    private readonly engine: DownloadService,
    private readonly ledger: DownloadsRepository
  ) {}

  /**
   * Load the downloaded set from the ledger and follow its changes.
   */
  async initialize(): Promise<void> {
    if (!this.unsubscribeLedger) {
      this.unsubscribeLedger = this.ledger.subscribe(event => this.handleLedgerEvent(event));
    }
    await this.reloadFromLedger();
  }

  dispose(): void {
    this.unsubscribeLedger?.();
    this.unsubscribeLedger = null;
    this.listeners.clear();
  }

  // ============ Observable Pattern ============

  getState(): DownloadsState {
    return this.state;
  }

  subscribe(listener: DownloadsListener): () => void {
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(changes: Partial<DownloadsState>): void {
    this.state = { ...this.state, ...changes };
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        console.error('[Downloads] Error in state listener:', error);
      }
    }
  }

  // ============ Actions ============

  /**
   * Run a download to its end, tracking progress. Resolves with the terminal event.
   */
  async startDownload(lesson: Lesson): Promise<DownloadProgress | null> {
    let last: DownloadProgress | null = null;
    this.setState({ error: null });

    try {
      for await (const event of this.engine.download(lesson)) {
        last = event;
        // Drain to the end so the engine has released the transfer on return
        if (event.status !== 'completed' && event.status !== 'failed') {
          this.setProgress(lesson.id, event);
        }
      }
    } catch (error) {
      console.error(`[Downloads] Could not start lesson ${lesson.id}:`, error);
      this.setState({ error: errorMessage(error) });
    }

    this.clearProgress(lesson.id);
    if (last?.status === 'failed' && !last.cancelled) {
      this.setState({ error: last.error ?? `Download of lesson ${lesson.id} failed` });
    }
    return last;
  }

  async cancel(lessonId: number): Promise<boolean> {
    try {
      return await this.engine.cancel(lessonId);
    } catch (error) {
      console.error(`[Downloads] Failed to cancel lesson ${lessonId}:`, error);
      this.setState({ error: errorMessage(error) });
      return false;
    }
  }

  pause(lessonId: number): boolean {
    return this.engine.pause(lessonId);
  }

  resume(lessonId: number): boolean {
    return this.engine.resume(lessonId);
  }

  async deleteDownload(lessonId: number): Promise<boolean> {
    try {
      return await this.engine.deleteDownload(lessonId);
    } catch (error) {
      console.error(`[Downloads] Failed to delete lesson ${lessonId}:`, error);
      this.setState({ error: errorMessage(error) });
      return false;
    }
  }

  // ============ Queries ============

  isDownloaded(lessonId: number): boolean {
    return this.state.downloadedIds.has(lessonId);
  }

  isDownloading(lessonId: number): boolean {
    return lessonId in this.state.activeDownloads;
  }

  getProgress(lessonId: number): DownloadProgress | null {
    return this.state.activeDownloads[lessonId] ?? null;
  }

  // ============ Internals ============

  private setProgress(lessonId: number, event: DownloadProgress): void {
    this.setState({ activeDownloads: { ...this.state.activeDownloads, [lessonId]: event } });
  }

  private clearProgress(lessonId: number): void {
    if (!(lessonId in this.state.activeDownloads)) return;
    const activeDownloads = { ...this.state.activeDownloads };
    delete activeDownloads[lessonId];
    this.setState({ activeDownloads });
  }

  private handleLedgerEvent(event: LedgerEvent): void {
    // Only completions and removals change the downloaded set
    if (event.type === 'status' && event.status !== 'completed' && !this.state.downloadedIds.has(event.lessonId)) {
      return;
    }
    this.reloadFromLedger().catch(error => console.error('[Downloads] Failed to refresh from ledger:', error));
  }

  private async reloadFromLedger(): Promise<void> {
    const [completed, totalBytes] = await Promise.all([
      this.ledger.getAll('completed'),
      this.ledger.totalCompletedBytes(),
    ]);
    const downloadedIds = new Set(completed.filter(asset => asset.file_path !== '').map(asset => asset.lesson_id));
    this.setState({ downloadedIds, badgeCount: downloadedIds.size, totalBytes });
  }
}
