/**
 * Sync Run Repository
 *
 * Database operations for synchronization runs.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { SyncRun, SyncStatus } from '../../../shared/types';

interface SyncRunRow {
  id: string;
  connection_id: string;
  from_date: string;
  to_date: string;
  status: SyncStatus;
  transactions_found: number;
  transactions_new: number;
  transactions_updated: number;
  transactions_skipped: number;
  error_message: string | null;
  started_at: string;
  completed_at: string | null;
}

function mapSyncRun(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    connectionId: row.connection_id,
    fromDate: row.from_date,
    toDate: row.to_date,
    status: row.status,
    transactionsFound: row.transactions_found,
    transactionsNew: row.transactions_new,
    transactionsUpdated: row.transactions_updated,
    transactionsSkipped: row.transactions_skipped,
    errorMessage: row.error_message ?? undefined,
    startedAt: row.started_at,
    completedAt: row.completed_at ?? undefined
  };
}

export function createSyncRun(connectionId: string, fromDate: string, toDate: string): SyncRun {
  const id = randomUUID();
  db.prepare(`
    INSERT INTO sync_runs (id, connection_id, from_date, to_date, status, started_at)
    VALUES (?, ?, ?, ?, 'running', ?)
  `).run(id, connectionId, fromDate, toDate, new Date().toISOString());
  return requireSyncRun(id);
}

export function getSyncRunById(id: string): SyncRun | null {
  const row = db.prepare<[string], SyncRunRow>(`SELECT * FROM sync_runs WHERE id = ?`).get(id);
  return row ? mapSyncRun(row) : null;
}

function requireSyncRun(id: string): SyncRun {
  const run = getSyncRunById(id);
  if (!run) {
    throw new Error(`Sync run ${id} not found`);
  }
  return run;
}

export function getSyncRunsByConnection(connectionId: string, limit = 20): SyncRun[] {
  return db.prepare<[string, number], SyncRunRow>(`
    SELECT * FROM sync_runs WHERE connection_id = ? ORDER BY started_at DESC, rowid DESC LIMIT ?
  `).all(connectionId, limit).map(mapSyncRun);
}

export interface SyncRunCounts {
  transactionsFound: number;
  transactionsNew: number;
  transactionsUpdated: number;
  transactionsSkipped: number;
}

/**
 * Moves a running sync to its terminal status. Returns false when the run
 * was already finalized, so the terminal status is only ever written once.
 */
export function finalizeSyncRun(
  id: string,
  status: Exclude<SyncStatus, 'running'>,
  counts: SyncRunCounts,
  errorMessage?: string
): boolean {
  const result = db.prepare(`
    UPDATE sync_runs SET
      status = ?,
      transactions_found = ?,
      transactions_new = ?,
      transactions_updated = ?,
      transactions_skipped = ?,
      error_message = ?,
      completed_at = ?
    WHERE id = ? AND status = 'running'
  `).run(
    status,
    counts.transactionsFound,
    counts.transactionsNew,
    counts.transactionsUpdated,
    counts.transactionsSkipped,
    errorMessage ?? null,
    new Date().toISOString(),
    id
  );
  return result.changes > 0;
}
