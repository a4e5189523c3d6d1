/**
 * Categorization Worker
 *
 * Background consumer of sync events. Runs the pipeline for every upserted
 * transaction that is new or still uncategorized. Failures are logged and the
 * worker moves on; the default pass means a transaction is never left
 * without a category unless the pipeline itself throws.
 */

import type { CategorizationPipeline } from '../ai/categorization-pipeline';
import type { EventChannel, SyncEvent, Subscription } from '../sync/event-channel';
import * as db from '../database/database';
import { errorMessage } from '../utils/errors';

export interface WorkerStats {
  running: boolean;
  processed: number;
  skipped: number;
  failed: number;
}

export class CategorizationWorker {
  private subscription: Subscription<SyncEvent> | null = null;
  private loop: Promise<void> | null = null;
  private processed = 0;
  private skipped = 0;
  private failed = 0;

  constructor(
    private readonly events: EventChannel<SyncEvent>,
    private readonly pipeline: CategorizationPipeline
  ) {}

  start(): void {
    if (this.subscription) return;
    const subscription = this.events.subscribe();
    this.subscription = subscription;
    this.loop = this.consume(subscription);
    console.log('[CategorizationWorker] Started');
  }

  /**
   * Stops receiving new events and waits for queued ones to be handled.
   */
  async stop(): Promise<void> {
    const { subscription, loop } = this;
    if (!subscription) return;
    subscription.close();
    await loop;
    this.subscription = null;
    this.loop = null;
    console.log(`[CategorizationWorker] Stopped (${this.processed} processed, ${this.failed} failed)`);
  }

  getStats(): WorkerStats {
    return {
      running: this.subscription !== null,
      processed: this.processed,
      skipped: this.skipped,
      failed: this.failed
    };
  }

  private async consume(subscription: Subscription<SyncEvent>): Promise<void> {
    for await (const event of subscription) {
      if (event.type !== 'transaction.upserted') continue;
      await this.handle(event.transactionId, event.isNew);
    }
  }

  private async handle(transactionId: string, isNew: boolean): Promise<void> {
    try {
      const transaction = db.getTransactionById(transactionId);
      if (!transaction || (!isNew && transaction.categoryId)) {
        this.skipped++;
        return;
      }
      const outcome = await this.pipeline.categorize(transactionId);
      if (outcome) {
        this.processed++;
      } else {
        this.skipped++;
      }
    } catch (error) {
      this.failed++;
      console.error(`[CategorizationWorker] Failed to categorize ${transactionId}:`, errorMessage(error));
    }
  }
}
