/**
 * Shared Connector Types
 *
 * Bank providers, consents, connections and sync runs.
 */

/**
 * Lifecycle of a bank connection
 */
export type ConnectionStatus = 'pending' | 'active' | 'error' | 'expired';

export type ConsentStatus = 'awaiting_authorisation' | 'authorised' | 'rejected' | 'expired';

export type SyncStatus = 'running' | 'completed' | 'failed' | 'partial';

export type BankingMode = 'sandbox' | 'production';

/**
 * Permissions requested when a consent is created
 */
export const ACCOUNT_PERMISSIONS = [
  'ACCOUNTS_READ',
  'ACCOUNTS_BALANCES_READ',
  'ACCOUNTS_TRANSACTIONS_READ',
  'ACCOUNTS_OVERDRAFT_LIMITS_READ'
] as const;

export type AccountPermission = typeof ACCOUNT_PERMISSIONS[number];

export interface BankProvider {
  code: string;
  name: string;
  slug: string;
  isActive: boolean;
  authCodePrefix: string;
  supportsPix: boolean;
}

export interface Consent {
  id: string;
  companyId: string;
  providerCode: string;
  permissions: AccountPermission[];
  state: string;
  nonce: string;
  status: ConsentStatus;
  expiresAt: string;
  connectionId?: string;
  createdAt: string;
}

/**
 * Connection as exposed to API consumers (tokens are never included)
 */
export interface BankConnectionView {
  id: string;
  companyId: string;
  providerCode: string;
  agency: string;
  accountNumber: string;
  accountDigit?: string;
  externalAccountId?: string;
  status: ConnectionStatus;
  currentBalanceMinor: number;
  availableBalanceMinor: number;
  currency: string;
  tokenExpiresAt?: string;
  lastSyncAt?: string;
  lastSyncError?: string;
  syncFrequencyHours: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface SyncRun {
  id: string;
  connectionId: string;
  fromDate: string;
  toDate: string;
  status: SyncStatus;
  transactionsFound: number;
  transactionsNew: number;
  transactionsUpdated: number;
  transactionsSkipped: number;
  errorMessage?: string;
  startedAt: string;
  completedAt?: string;
}
