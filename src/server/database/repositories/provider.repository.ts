/**
 * Provider Repository
 *
 * Database operations for bank providers.
 */

import { db } from '../connection';
import type { BankProvider } from '../../../shared/types';

interface ProviderRow {
  code: string;
  name: string;
  slug: string;
  is_active: number;
  auth_code_prefix: string;
  supports_pix: number;
}

function mapProvider(row: ProviderRow): BankProvider {
  return {
    code: row.code,
    name: row.name,
    slug: row.slug,
    isActive: row.is_active === 1,
    authCodePrefix: row.auth_code_prefix,
    supportsPix: row.supports_pix === 1
  };
}

export function getProviderByCode(code: string): BankProvider | null {
  const row = db.prepare<[string], ProviderRow>(`SELECT * FROM providers WHERE code = ?`).get(code);
  return row ? mapProvider(row) : null;
}

export function getActiveProviders(): BankProvider[] {
  return db.prepare<[], ProviderRow>(`SELECT * FROM providers WHERE is_active = 1 ORDER BY name`)
    .all()
    .map(mapProvider);
}

export function upsertProvider(provider: BankProvider): void {
  db.prepare(`
    INSERT INTO providers (code, name, slug, is_active, auth_code_prefix, supports_pix)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(code) DO UPDATE SET
      name = excluded.name,
      slug = excluded.slug,
      auth_code_prefix = excluded.auth_code_prefix,
      supports_pix = excluded.supports_pix
  `).run(
    provider.code,
    provider.name,
    provider.slug,
    provider.isActive ? 1 : 0,
    provider.authCodePrefix,
    provider.supportsPix ? 1 : 0
  );
}
