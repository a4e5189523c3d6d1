/**
 * Sync Orchestrator
 *
 * Runs one synchronization pass for a bank connection:
 * lock → open run → balance → transaction pages → finalize.
 *
 * Each page is upserted in its own SQLite transaction and its events are
 * published after the commit. The run's terminal status is written once,
 * after the last page commit. Retries are left to the scheduler.
 */

import { randomUUID } from 'crypto';
import type { SyncRun } from '../../shared/types';
import * as db from '../database/database';
import type { BankConnection } from '../database/database';
import { AppError } from '../middleware/error-handler';
import type { AccountGateway, PaginationOutcome } from '../connectors/account-gateway';
import type { DateRange } from '../connectors/base-connector';
import { abortable } from '../utils/abort';
import {
  SyncAlreadyRunningError,
  SyncFailedError,
  SyncTimeoutError,
  errorMessage
} from '../utils/errors';
import type { EventChannel, SyncEvent } from './event-channel';

export interface SyncOrchestratorOptions {
  gateway: AccountGateway;
  events: EventChannel<SyncEvent>;
  maxDurationMs: number;
  defaultDaysBack: number;
}

export interface SyncOptions {
  daysBack?: number;
  now?: Date;
}

interface RunCounts {
  transactionsFound: number;
  transactionsNew: number;
  transactionsUpdated: number;
  transactionsSkipped: number;
}

const DAY_MS = 86_400_000;

/**
 * Booking window [today - daysBack, today] in UTC dates.
 */
export function syncWindow(daysBack: number, now = new Date()): DateRange {
  const to = now.toISOString().slice(0, 10);
  const from = new Date(Date.parse(`${to}T00:00:00.000Z`) - daysBack * DAY_MS).toISOString().slice(0, 10);
  return { from, to };
}

export class SyncOrchestrator {
  constructor(private readonly options: SyncOrchestratorOptions) {}

  async syncConnection(connectionId: string, syncOptions: SyncOptions = {}): Promise<SyncRun> {
    const connection = db.getConnectionById(connectionId);
    if (!connection || !connection.isActive) {
      throw AppError.notFound(`Connection ${connectionId} not found`);
    }

    const budgetMs = this.options.maxDurationMs;
    const owner = randomUUID();
    if (!db.tryAcquireSyncLock(connectionId, owner, budgetMs)) {
      throw new SyncAlreadyRunningError(connectionId);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new SyncTimeoutError(budgetMs)), budgetMs);
    const counts: RunCounts = { transactionsFound: 0, transactionsNew: 0, transactionsUpdated: 0, transactionsSkipped: 0 };
    let runId: string | undefined;

    try {
      const range = syncWindow(syncOptions.daysBack ?? this.options.defaultDaysBack, syncOptions.now);
      runId = db.createSyncRun(connectionId, range.from, range.to).id;
      console.log(`[SyncOrchestrator] Run ${runId} started for connection ${connectionId} (${range.from}..${range.to})`);

      const pagination = await this.execute(connection, range, counts, controller.signal);

      const notes: string[] = [];
      if (counts.transactionsSkipped > 0) {
        notes.push(`${counts.transactionsSkipped} malformed transactions skipped`);
      }
      if (pagination.truncated) {
        notes.push(`stopped after ${pagination.pages} pages with more pending`);
      }
      const status = notes.length > 0 ? 'partial' : 'completed';
      db.finalizeSyncRun(runId, status, counts, notes.length > 0 ? notes.join('; ') : undefined);
      console.log(
        `[SyncOrchestrator] Run ${runId} ${status}: ${counts.transactionsFound} found, ` +
        `${counts.transactionsNew} new, ${counts.transactionsUpdated} updated, ${counts.transactionsSkipped} skipped`
      );
      return this.requireRun(runId);
    } catch (error) {
      const failure = this.toSyncError(error, controller.signal);
      console.error(`[SyncOrchestrator] Sync failed for connection ${connectionId}:`, failure.message);
      if (runId) {
        db.finalizeSyncRun(runId, 'failed', counts, failure.message);
      }
      // A connection whose grant was revoked stays expired
      if (db.getConnectionById(connectionId)?.status !== 'expired') {
        db.updateConnectionStatus(connectionId, 'error', failure.message);
      }
      throw failure;
    } finally {
      clearTimeout(timer);
      db.releaseSyncLock(connectionId, owner);
    }
  }

  private async execute(
    connection: BankConnection,
    range: DateRange,
    counts: RunCounts,
    signal: AbortSignal
  ): Promise<PaginationOutcome> {
    const { gateway, events } = this.options;

    // Balance
    const account = await abortable(gateway.getAccountInfo(connection, { signal }), signal);
    db.updateConnectionBalance(connection.id, {
      currentBalanceMinor: account.balanceMinor,
      availableBalanceMinor: account.availableBalanceMinor,
      currency: account.currency,
      syncedAt: new Date().toISOString()
    });
    if (account.balanceMinor !== connection.currentBalanceMinor) {
      await abortable(events.publish({
        type: 'balance.changed',
        connectionId: connection.id,
        companyId: connection.companyId,
        previousMinor: connection.currentBalanceMinor,
        currentMinor: account.balanceMinor,
        currency: account.currency
      }), signal);
    }

    // Transactions, one committed page at a time
    const pages = gateway.transactionPages(connection, range, { signal });
    for (;;) {
      const next = await abortable(pages.next(), signal);
      if (next.done) {
        return next.value;
      }
      const batch = next.value;
      signal.throwIfAborted();

      for (const skipped of batch.skipped) {
        console.error(`[SyncOrchestrator] Skipped transaction ${skipped.externalId ?? '(no id)'}: ${skipped.reason}`);
      }

      const upserted = db.upsertTransactionBatch(connection.id, connection.companyId, batch.transactions);
      counts.transactionsFound += batch.transactions.length + batch.skipped.length;
      counts.transactionsSkipped += batch.skipped.length;
      for (const row of upserted) {
        if (row.isNew) counts.transactionsNew++;
        else counts.transactionsUpdated++;
      }

      for (const row of upserted) {
        await abortable(events.publish({
          type: 'transaction.upserted',
          transactionId: row.id,
          connectionId: connection.id,
          companyId: connection.companyId,
          isNew: row.isNew
        }), signal);
      }
    }
  }

  private toSyncError(error: unknown, signal: AbortSignal): AppError {
    if (signal.aborted) {
      return signal.reason instanceof SyncTimeoutError ? signal.reason : new SyncTimeoutError(this.options.maxDurationMs);
    }
    if (error instanceof AppError) {
      return error;
    }
    return new SyncFailedError(`Sync failed: ${errorMessage(error)}`);
  }

  private requireRun(runId: string): SyncRun {
    const run = db.getSyncRunById(runId);
    if (!run) {
      throw new SyncFailedError(`Sync run ${runId} disappeared`);
    }
    return run;
  }
}
