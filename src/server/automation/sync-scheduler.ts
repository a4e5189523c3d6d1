/**
 * Sync Scheduler
 *
 * Handles background synchronization:
 * - Enqueues connections whose sync frequency has elapsed, on an interval
 * - Runs queued syncs in a bounded worker pool
 * - Retries transient failures with exponential backoff
 */

import type { SyncRun } from '../../shared/types';
import * as db from '../database/database';
import { RateLimitedError, SyncAlreadyRunningError, errorMessage, isRetryable } from '../utils/errors';

export interface SyncRunner {
  syncConnection(connectionId: string): Promise<SyncRun>;
}

export interface SyncSchedulerConfig {
  intervalMinutes: number;
  concurrency: number;
  maxRetries: number;
  retryBaseMs: number;
}

export interface SchedulerStatus {
  running: boolean;
  queued: number;
  active: number;
  pendingRetries: number;
  lastTickAt?: string;
}

interface SyncJob {
  connectionId: string;
  attempt: number;
}

export class SyncScheduler {
  private readonly queue: SyncJob[] = [];
  private readonly scheduled = new Set<string>();
  private readonly retryTimers = new Map<NodeJS.Timeout, string>();
  private readonly idleWaiters: (() => void)[] = [];
  private interval: NodeJS.Timeout | null = null;
  private active = 0;
  private lastTickAt?: string;

  constructor(
    private readonly runner: SyncRunner,
    private readonly config: SyncSchedulerConfig
  ) {}

  /**
   * Start the periodic tick. An interval of 0 disables it.
   */
  start(): void {
    if (this.interval || this.config.intervalMinutes <= 0) return;

    const intervalMs = this.config.intervalMinutes * 60 * 1000;
    this.interval = setInterval(() => this.tick(), intervalMs);
    this.interval.unref();
    console.log(`[Scheduler] Scheduled sync enabled: every ${this.config.intervalMinutes} minutes`);
    this.tick();
  }

  /**
   * Stops the tick, drops queued jobs and pending retries. Running syncs finish.
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    for (const [timer, connectionId] of this.retryTimers) {
      clearTimeout(timer);
      this.scheduled.delete(connectionId);
    }
    this.retryTimers.clear();
    for (const job of this.queue.splice(0)) {
      this.scheduled.delete(job.connectionId);
    }
    this.notifyIfIdle();
  }

  tick(now = new Date()): number {
    this.lastTickAt = now.toISOString();
    try {
      return this.enqueueDueConnections(now);
    } catch (error) {
      console.error('[Scheduler] Failed to enqueue due connections:', errorMessage(error));
      return 0;
    }
  }

  enqueueDueConnections(now = new Date()): number {
    let added = 0;
    for (const connection of db.getConnectionsDueForSync(now)) {
      if (this.enqueue(connection.id)) added++;
    }
    if (added > 0) {
      console.log(`[Scheduler] Enqueued ${added} connection(s) for sync`);
    }
    return added;
  }

  /**
   * Queues a sync unless one is already queued, running or awaiting retry for this connection.
   */
  enqueue(connectionId: string): boolean {
    if (this.scheduled.has(connectionId)) return false;
    this.scheduled.add(connectionId);
    this.queue.push({ connectionId, attempt: 0 });
    this.pump();
    return true;
  }

  /**
   * Resolves once nothing is queued, running or waiting to be retried.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.interval !== null,
      queued: this.queue.length,
      active: this.active,
      pendingRetries: this.retryTimers.size,
      lastTickAt: this.lastTickAt
    };
  }

  /**
   * Backoff before attempt n+1: base * 2^n, or the provider's Retry-After if longer.
   */
  retryDelay(attempt: number, error: unknown): number {
    const backoff = this.config.retryBaseMs * 2 ** attempt;
    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      return Math.max(backoff, error.retryAfterMs);
    }
    return backoff;
  }

  private pump(): void {
    while (this.active < this.config.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) break;
      this.active++;
      void this.run(job).finally(() => {
        this.active--;
        this.pump();
        this.notifyIfIdle();
      });
    }
  }

  private async run(job: SyncJob): Promise<void> {
    let retrying = false;
    try {
      const result = await this.runner.syncConnection(job.connectionId);
      console.log(`[Scheduler] Sync of ${job.connectionId} finished: ${result.status}`);
    } catch (error) {
      if (error instanceof SyncAlreadyRunningError) {
        console.log(`[Scheduler] Sync of ${job.connectionId} skipped: already running`);
      } else if (isRetryable(error) && job.attempt < this.config.maxRetries) {
        const delay = this.retryDelay(job.attempt, error);
        console.error(
          `[Scheduler] Sync of ${job.connectionId} failed (attempt ${job.attempt + 1}), retrying in ${delay}ms:`,
          errorMessage(error)
        );
        this.scheduleRetry({ connectionId: job.connectionId, attempt: job.attempt + 1 }, delay);
        retrying = true;
      } else {
        console.error(`[Scheduler] Sync of ${job.connectionId} failed permanently:`, errorMessage(error));
      }
    } finally {
      if (!retrying) {
        this.scheduled.delete(job.connectionId);
      }
    }
  }

  private scheduleRetry(job: SyncJob, delayMs: number): void {
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      this.queue.push(job);
      this.pump();
    }, delayMs);
    timer.unref();
    this.retryTimers.set(timer, job.connectionId);
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0 && this.retryTimers.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
