/**
 * Connection Repository
 *
 * Database operations for bank connections and their sealed tokens.
 */

import { randomUUID } from 'crypto';
import { db } from '../connection';
import type { BankConnectionView, ConnectionStatus } from '../../../shared/types';

/**
 * Connection including the encrypted token columns. Never sent to API clients.
 */
export interface BankConnection extends BankConnectionView {
  accessTokenEncrypted?: string;
  refreshTokenEncrypted?: string;
}

interface ConnectionRow {
  id: string;
  company_id: string;
  provider_code: string;
  agency: string;
  account_number: string;
  account_digit: string | null;
  external_account_id: string | null;
  access_token_encrypted: string | null;
  refresh_token_encrypted: string | null;
  token_expires_at: string | null;
  status: ConnectionStatus;
  current_balance_minor: number;
  available_balance_minor: number;
  currency: string;
  last_sync_at: string | null;
  last_sync_error: string | null;
  sync_frequency_hours: number;
  is_active: number;
  created_at: string;
  updated_at: string;
}

function mapConnection(row: ConnectionRow): BankConnection {
  return {
    id: row.id,
    companyId: row.company_id,
    providerCode: row.provider_code,
    agency: row.agency,
    accountNumber: row.account_number,
    accountDigit: row.account_digit ?? undefined,
    externalAccountId: row.external_account_id ?? undefined,
    accessTokenEncrypted: row.access_token_encrypted ?? undefined,
    refreshTokenEncrypted: row.refresh_token_encrypted ?? undefined,
    tokenExpiresAt: row.token_expires_at ?? undefined,
    status: row.status,
    currentBalanceMinor: row.current_balance_minor,
    availableBalanceMinor: row.available_balance_minor,
    currency: row.currency,
    lastSyncAt: row.last_sync_at ?? undefined,
    lastSyncError: row.last_sync_error ?? undefined,
    syncFrequencyHours: row.sync_frequency_hours,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Strips the token columns for API responses.
 */
export function toConnectionView(connection: BankConnection): BankConnectionView {
  const { accessTokenEncrypted: _access, refreshTokenEncrypted: _refresh, ...view } = connection;
  return view;
}

export function getConnectionById(id: string): BankConnection | null {
  const row = db.prepare<[string], ConnectionRow>(`SELECT * FROM bank_connections WHERE id = ?`).get(id);
  return row ? mapConnection(row) : null;
}

export function getConnectionsByCompany(companyId: string): BankConnection[] {
  return db.prepare<[string], ConnectionRow>(`
    SELECT * FROM bank_connections WHERE company_id = ? AND is_active = 1 ORDER BY created_at
  `).all(companyId).map(mapConnection);
}

export function getAllActiveConnections(): BankConnection[] {
  return db.prepare<[], ConnectionRow>(`SELECT * FROM bank_connections WHERE is_active = 1 ORDER BY created_at`)
    .all()
    .map(mapConnection);
}

/**
 * Connections whose last sync is older than their sync frequency.
 * Expired and pending connections need user action and are never due.
 */
export function getConnectionsDueForSync(now: Date): BankConnection[] {
  return getAllActiveConnections().filter(connection => {
    if (connection.status !== 'active' && connection.status !== 'error') return false;
    if (!connection.lastSyncAt) return true;
    const dueAt = new Date(connection.lastSyncAt).getTime() + connection.syncFrequencyHours * 3_600_000;
    return dueAt <= now.getTime();
  });
}

export interface ConnectionIdentity {
  companyId: string;
  providerCode: string;
  agency: string;
  accountNumber: string;
  accountDigit?: string;
  externalAccountId?: string;
  currency: string;
}

export interface SealedTokens {
  accessTokenEncrypted: string;
  refreshTokenEncrypted?: string;
  tokenExpiresAt: string;
}

/**
 * Creates the connection for an account, or reactivates the existing one
 * with fresh tokens when the same account is connected again.
 */
export function upsertConnection(identity: ConnectionIdentity, tokens: SealedTokens): BankConnection {
  const now = new Date().toISOString();
  db.prepare(`
    INSERT INTO bank_connections (
      id, company_id, provider_code, agency, account_number, account_digit, external_account_id,
      access_token_encrypted, refresh_token_encrypted, token_expires_at, status, currency,
      is_active, created_at, updated_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'active', ?, 1, ?, ?)
    ON CONFLICT(company_id, provider_code, agency, account_number) DO UPDATE SET
      account_digit = excluded.account_digit,
      external_account_id = excluded.external_account_id,
      access_token_encrypted = excluded.access_token_encrypted,
      refresh_token_encrypted = excluded.refresh_token_encrypted,
      token_expires_at = excluded.token_expires_at,
      status = 'active',
      last_sync_error = NULL,
      is_active = 1,
      updated_at = excluded.updated_at
  `).run(
    randomUUID(),
    identity.companyId,
    identity.providerCode,
    identity.agency,
    identity.accountNumber,
    identity.accountDigit ?? null,
    identity.externalAccountId ?? null,
    tokens.accessTokenEncrypted,
    tokens.refreshTokenEncrypted ?? null,
    tokens.tokenExpiresAt,
    identity.currency,
    now,
    now
  );

  const row = db.prepare<[string, string, string, string], ConnectionRow>(`
    SELECT * FROM bank_connections
    WHERE company_id = ? AND provider_code = ? AND agency = ? AND account_number = ?
  `).get(identity.companyId, identity.providerCode, identity.agency, identity.accountNumber);
  if (!row) {
    throw new Error(`Connection for account ${identity.agency}/${identity.accountNumber} was not stored`);
  }
  return mapConnection(row);
}

/**
 * Stores refreshed tokens. A missing refresh token keeps the previous one.
 */
export function updateConnectionTokens(id: string, tokens: SealedTokens): void {
  db.prepare(`
    UPDATE bank_connections SET
      access_token_encrypted = ?,
      refresh_token_encrypted = COALESCE(?, refresh_token_encrypted),
      token_expires_at = ?,
      status = 'active',
      updated_at = ?
    WHERE id = ?
  `).run(
    tokens.accessTokenEncrypted,
    tokens.refreshTokenEncrypted ?? null,
    tokens.tokenExpiresAt,
    new Date().toISOString(),
    id
  );
}

export function updateConnectionStatus(id: string, status: ConnectionStatus, errorMessage?: string): void {
  db.prepare(`
    UPDATE bank_connections SET status = ?, last_sync_error = ?, updated_at = ? WHERE id = ?
  `).run(status, errorMessage ?? null, new Date().toISOString(), id);
}

export interface BalanceUpdate {
  currentBalanceMinor: number;
  availableBalanceMinor: number;
  currency: string;
  syncedAt: string;
}

export function updateConnectionBalance(id: string, balance: BalanceUpdate): void {
  db.prepare(`
    UPDATE bank_connections SET
      current_balance_minor = ?,
      available_balance_minor = ?,
      currency = ?,
      status = 'active',
      last_sync_at = ?,
      last_sync_error = NULL,
      updated_at = ?
    WHERE id = ?
  `).run(
    balance.currentBalanceMinor,
    balance.availableBalanceMinor,
    balance.currency,
    balance.syncedAt,
    balance.syncedAt,
    id
  );
}

export function updateSyncFrequency(id: string, hours: number): boolean {
  const result = db.prepare(`UPDATE bank_connections SET sync_frequency_hours = ?, updated_at = ? WHERE id = ?`)
    .run(hours, new Date().toISOString(), id);
  return result.changes > 0;
}

/**
 * Connections are disabled, never deleted, so their transactions keep a parent.
 */
export function deactivateConnection(id: string): boolean {
  const result = db.prepare(`UPDATE bank_connections SET is_active = 0, updated_at = ? WHERE id = ?`)
    .run(new Date().toISOString(), id);
  return result.changes > 0;
}
