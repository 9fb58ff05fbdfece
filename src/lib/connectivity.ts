/**
 * Connectivity Monitor
 *
 * Tracks whether the catalog server is reachable. Status comes from a probe
 * request and is reused for a few seconds so bursts of reads do not each
 * pay for a round trip. Listeners hear about every change, with a flag for
 * the offline → online transition that should trigger a refresh.
 */

import { addSeconds, isBefore } from 'date-fns';
import { isConnectivityError } from '@/api/errors';

export type ConnectivityProbe = () => Promise<boolean>;

export interface ConnectivityChange {
  online: boolean;
  /** True when the previous known state was offline. */
  restored: boolean;
}

export type ConnectivityListener = (change: ConnectivityChange) => void;

export interface ConnectivityMonitorOptions {
  /** How long a probe result stays valid. */
  cacheSeconds: number;
  now?: () => Date;
}

export class ConnectivityMonitor {
  private online: boolean | null = null;
  private checkedAt: Date | null = null;
  private inflight: Promise<boolean> | null = null;
  private listeners: Set<ConnectivityListener> = new Set();
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly probe: ConnectivityProbe,
    private readonly options: ConnectivityMonitorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Last known status, null before the first check.
   */
  get lastKnown(): boolean | null {
    return this.online;
  }

  /**
   * Cached status if still fresh, otherwise a new probe.
   */
  async isOnline(): Promise<boolean> {
    if (this.online !== null && this.checkedAt && isBefore(this.now(), addSeconds(this.checkedAt, this.options.cacheSeconds))) {
      return this.online;
    }
    return this.checkNow();
  }

  /**
   * Probe now, ignoring the cache. Concurrent calls share one probe.
   */
  checkNow(): Promise<boolean> {
    if (!this.inflight) {
      this.inflight = this.runProbe().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Record a status observed elsewhere, e.g. a request that just failed.
   */
  setOnline(online: boolean): void {
    const previous = this.online;
    this.online = online;
    this.checkedAt = this.now();

    if (previous === online) return;
    console.log(`[Connectivity] ${online ? 'Online' : 'Offline'}`);

    const change: ConnectivityChange = { online, restored: previous === false && online };
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        console.error('[Connectivity] Error in listener:', error);
      }
    }
  }

  onChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Probe periodically until stopped.
   */
  start(intervalMs: number): void {
    if (this.intervalId) return;
    this.intervalId = setInterval(() => {
      this.checkNow().catch(error => console.error('[Connectivity] Periodic check failed:', error));
    }, intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private async runProbe(): Promise<boolean> {
    let online: boolean;
    try {
      online = await this.probe();
    } catch (error) {
      console.warn('[Connectivity] Probe failed:', error);
      online = false;
    }
    this.setOnline(online);
    return online;
  }
}

/**
 * Probe that asks the API for a single theme. A server answering with an
 * error is still reachable; only transport failures count as offline.
 */
export function createApiProbe(request: () => Promise<unknown>): ConnectivityProbe {
  return async () => {
    try {
      await request();
      return true;
    } catch (error) {
      if (isConnectivityError(error)) return false;
      return true;
    }
  };
}
