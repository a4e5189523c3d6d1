/**
 * Base connector interfaces for Open Banking providers.
 *
 * A connector speaks to one banking backend (the production Open Banking
 * network or the in-process sandbox). Both modes implement the same pair of
 * interfaces and return the providers' wire payloads, which the parsers turn
 * into canonical values.
 */

import type { AccountPermission, BankProvider, BankingMode } from '../../shared/types';

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  expiresIn: number;
  tokenType: string;
  scope?: string;
}

export interface AuthorizationRequest {
  consentId: string;
  state: string;
  nonce: string;
  scope: string;
}

/**
 * Booking date window, both ends inclusive, as YYYY-MM-DD.
 */
export interface DateRange {
  from: string;
  to: string;
}

export interface AccountInfo {
  accountId: string;
  agency: string;
  accountNumber: string;
  checkDigit?: string;
  balanceMinor: number;
  availableBalanceMinor: number;
  currency: string;
  status?: string;
}

/**
 * One page of provider transactions, items not yet validated.
 */
export interface RawTransactionPage {
  items: unknown[];
  page: number;
  totalPages?: number;
  hasNext: boolean;
}

export interface OAuthConnector {
  readonly mode: BankingMode;

  createConsentId(): string;

  buildAuthorizationUrl(provider: BankProvider, request: AuthorizationRequest): string;

  exchangeCode(provider: BankProvider, code: string, options?: RequestOptions): Promise<TokenSet>;

  refreshTokens(provider: BankProvider, refreshToken: string, options?: RequestOptions): Promise<TokenSet>;
}

export interface AccountDataApi {
  getAccountInfo(provider: BankProvider, accessToken: string, options?: RequestOptions): Promise<AccountInfo>;

  getTransactionPage(
    provider: BankProvider,
    accessToken: string,
    accountId: string,
    range: DateRange,
    page: number,
    options?: RequestOptions
  ): Promise<RawTransactionPage>;
}

export type BankConnector = OAuthConnector & AccountDataApi;

const PERMISSION_SCOPES: Record<AccountPermission, string> = {
  ACCOUNTS_READ: 'accounts',
  ACCOUNTS_BALANCES_READ: 'accounts',
  ACCOUNTS_TRANSACTIONS_READ: 'transactions',
  ACCOUNTS_OVERDRAFT_LIMITS_READ: 'accounts'
};

/**
 * OAuth scope requested for a set of consent permissions.
 */
export function scopeForPermissions(permissions: readonly AccountPermission[]): string {
  const scopes = new Set(['openid']);
  for (const permission of permissions) {
    scopes.add(PERMISSION_SCOPES[permission]);
  }
  return [...scopes].join(' ');
}

export const CONSENT_TTL_SECONDS = 900;
export const MAX_TRANSACTION_PAGES = 500;
