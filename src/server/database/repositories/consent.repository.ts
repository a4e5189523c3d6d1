/**
 * Consent Repository
 *
 * Database operations for pending Open Banking consents.
 */

import { db } from '../connection';
import type { AccountPermission, Consent, ConsentStatus } from '../../../shared/types';

interface ConsentRow {
  id: string;
  company_id: string;
  provider_code: string;
  permissions: string;
  state: string;
  nonce: string;
  status: ConsentStatus;
  expires_at: string;
  connection_id: string | null;
  created_at: string;
}

function mapConsent(row: ConsentRow): Consent {
  const permissions: AccountPermission[] = JSON.parse(row.permissions);
  return {
    id: row.id,
    companyId: row.company_id,
    providerCode: row.provider_code,
    permissions,
    state: row.state,
    nonce: row.nonce,
    status: row.status,
    expiresAt: row.expires_at,
    connectionId: row.connection_id ?? undefined,
    createdAt: row.created_at
  };
}

export function insertConsent(consent: Consent): void {
  db.prepare(`
    INSERT INTO consents (id, company_id, provider_code, permissions, state, nonce, status, expires_at, connection_id, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    consent.id,
    consent.companyId,
    consent.providerCode,
    JSON.stringify(consent.permissions),
    consent.state,
    consent.nonce,
    consent.status,
    consent.expiresAt,
    consent.connectionId ?? null,
    consent.createdAt
  );
}

export function getConsentByState(state: string): Consent | null {
  const row = db.prepare<[string], ConsentRow>(`SELECT * FROM consents WHERE state = ?`).get(state);
  return row ? mapConsent(row) : null;
}

export function getConsentById(id: string): Consent | null {
  const row = db.prepare<[string], ConsentRow>(`SELECT * FROM consents WHERE id = ?`).get(id);
  return row ? mapConsent(row) : null;
}

export function updateConsentStatus(id: string, status: ConsentStatus, connectionId?: string): void {
  db.prepare(`UPDATE consents SET status = ?, connection_id = COALESCE(?, connection_id) WHERE id = ?`)
    .run(status, connectionId ?? null, id);
}
