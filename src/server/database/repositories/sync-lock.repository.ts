/**
 * Sync Lock Repository
 *
 * Advisory per-connection lock rows. A lock past its expiry can be taken over.
 */

import { db } from '../connection';

export function tryAcquireSyncLock(connectionId: string, owner: string, ttlMs: number, now = new Date()): boolean {
  const acquiredAt = now.toISOString();
  const expiresAt = new Date(now.getTime() + ttlMs).toISOString();
  const result = db.prepare(`
    INSERT INTO sync_locks (connection_id, owner, acquired_at, expires_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(connection_id) DO UPDATE SET
      owner = excluded.owner,
      acquired_at = excluded.acquired_at,
      expires_at = excluded.expires_at
    WHERE sync_locks.expires_at <= excluded.acquired_at
  `).run(connectionId, owner, acquiredAt, expiresAt);
  return result.changes > 0;
}

export function releaseSyncLock(connectionId: string, owner: string): boolean {
  const result = db.prepare(`DELETE FROM sync_locks WHERE connection_id = ? AND owner = ?`).run(connectionId, owner);
  return result.changes > 0;
}

export function isSyncLocked(connectionId: string, now = new Date()): boolean {
  const row = db.prepare<[string, string], { owner: string }>(`
    SELECT owner FROM sync_locks WHERE connection_id = ? AND expires_at > ?
  `).get(connectionId, now.toISOString());
  return row !== undefined;
}
