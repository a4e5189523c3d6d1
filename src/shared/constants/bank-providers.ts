/**
 * Bank Providers
 *
 * Institutions reachable through the Open Banking directory.
 */

import providers from './bank-providers.json';

export interface BankProviderSeed {
  code: string;
  name: string;
  slug: string;
  supportsPix: boolean;
}

export const BANK_PROVIDERS: BankProviderSeed[] = providers;

export const SANDBOX_AUTH_CODE_PREFIX = 'sandbox-auth-';
