/**
 * Sandbox Bank
 *
 * In-process simulation of an Open Banking provider. Issues authorization
 * codes and tokens, and serves account and transaction payloads in the same
 * wire format as the production APIs. Generated history is deterministic for
 * a given seed, account and day, so repeated syncs see the same external ids.
 */

import { createHash, randomUUID } from 'crypto';
import { SANDBOX_AUTH_CODE_PREFIX } from '../../../shared/constants/bank-providers';
import { AuthError, InvalidGrantError, ProviderRequestError } from '../../utils/errors';
import { formatMinor } from '../../utils/money';
import templates from './sandbox-data.json';

export type SandboxOperation = 'token' | 'accounts' | 'transactions';

export interface SandboxBankOptions {
  seed?: number;
  pageSize?: number;
  maxTransactionsPerDay?: number;
  tokenLifetimeSeconds?: number;
  now?: () => Date;
}

export interface SandboxTokenResponse {
  access_token: string;
  refresh_token: string;
  expires_in: number;
  token_type: 'Bearer';
  scope: string;
}

export interface SandboxAccount {
  accountId: string;
  providerSlug: string;
  agency: string;
  accountNumber: string;
  checkDigit: string;
  balanceMinor: number;
  availableBalanceMinor: number;
  /** Items added by tests or simulations, keyed by transactionId; they replace generated ones. */
  extraItems: Map<string, Record<string, unknown>>;
}

interface AccessGrant {
  accountId: string;
  expiresAt: number;
}

interface Fault {
  operation: SandboxOperation;
  error: Error;
  remaining: number;
}

const SANDBOX_SCOPE = 'openid accounts transactions';
const DAY_MS = 86_400_000;

/**
 * Small seeded PRNG (mulberry32).
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(...parts: (string | number)[]): number {
  return createHash('sha256').update(parts.join('|')).digest().readUInt32BE(0);
}

function digits(random: () => number, count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) {
    out += Math.floor(random() * 10).toString();
  }
  return out;
}

export class SandboxBank {
  private readonly seed: number;
  private readonly pageSize: number;
  private readonly maxPerDay: number;
  private readonly tokenLifetime: number;
  private readonly now: () => Date;

  private readonly issuedCodes = new Map<string, string>();
  private readonly usedCodes = new Set<string>();
  private readonly accessTokens = new Map<string, AccessGrant>();
  private readonly refreshTokens = new Map<string, string>();
  private readonly accounts = new Map<string, SandboxAccount>();
  private readonly faults: Fault[] = [];

  constructor(options: SandboxBankOptions = {}) {
    this.seed = options.seed ?? 42;
    this.pageSize = options.pageSize ?? 25;
    this.maxPerDay = options.maxTransactionsPerDay ?? 3;
    this.tokenLifetime = options.tokenLifetimeSeconds ?? 3600;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Called by the sandbox authorization page once the "user" approves.
   */
  issueAuthorizationCode(providerSlug: string): string {
    const code = `${SANDBOX_AUTH_CODE_PREFIX}${randomUUID()}`;
    this.issuedCodes.set(code, providerSlug);
    return code;
  }

  /**
   * Any well-formed sandbox code is accepted once. Issued codes must be
   * redeemed at the provider that issued them.
   */
  exchangeCode(providerSlug: string, code: string): SandboxTokenResponse {
    this.consumeFault('token');

    if (!code.startsWith(SANDBOX_AUTH_CODE_PREFIX) || this.usedCodes.has(code)) {
      throw new InvalidGrantError('Authorization code is invalid or was already used');
    }
    const issuer = this.issuedCodes.get(code);
    if (issuer !== undefined && issuer !== providerSlug) {
      throw new InvalidGrantError('Authorization code was issued by another provider');
    }

    this.usedCodes.add(code);
    this.issuedCodes.delete(code);
    const account = this.openAccount(providerSlug, code);
    return this.issueTokens(account.accountId);
  }

  refresh(refreshToken: string): SandboxTokenResponse {
    this.consumeFault('token');

    const accountId = this.refreshTokens.get(refreshToken);
    if (!accountId) {
      throw new InvalidGrantError('Refresh token is invalid or was revoked');
    }
    this.refreshTokens.delete(refreshToken);
    return this.issueTokens(accountId);
  }

  accountInfo(accessToken: string): Record<string, unknown> {
    this.consumeFault('accounts');
    const account = this.authorize(accessToken);

    return {
      data: {
        accountId: account.accountId,
        agency: account.agency,
        accountNumber: account.accountNumber,
        checkDigit: account.checkDigit,
        balance: formatMinor(account.balanceMinor),
        availableBalance: formatMinor(account.availableBalanceMinor),
        currency: 'BRL',
        status: 'AVAILABLE'
      },
      links: { self: `/accounts/${account.accountId}` },
      meta: { totalRecords: 1, totalPages: 1 }
    };
  }

  transactions(accessToken: string, accountId: string, from: string, to: string, page: number): Record<string, unknown> {
    this.consumeFault('transactions');
    const account = this.authorize(accessToken);
    if (account.accountId !== accountId) {
      throw new ProviderRequestError(404, `Account ${accountId} not found`);
    }

    const items = this.history(account, from, to);
    const totalPages = Math.max(1, Math.ceil(items.length / this.pageSize));
    const start = (page - 1) * this.pageSize;
    const self = `/accounts/${accountId}/transactions?fromBookingDate=${from}&toBookingDate=${to}&page=${page}`;

    return {
      data: { transactions: items.slice(start, start + this.pageSize) },
      links: {
        self,
        ...(page < totalPages && {
          next: `/accounts/${accountId}/transactions?fromBookingDate=${from}&toBookingDate=${to}&page=${page + 1}`
        })
      },
      meta: { totalRecords: items.length, totalPages }
    };
  }

  // ==================== SIMULATION CONTROLS ====================

  /**
   * Makes the next `times` calls of an operation throw the given error.
   */
  injectFault(operation: SandboxOperation, error: Error, times = 1): void {
    this.faults.push({ operation, error, remaining: times });
  }

  expireAccessTokens(): void {
    for (const grant of this.accessTokens.values()) {
      grant.expiresAt = 0;
    }
  }

  getAccount(accountId: string): SandboxAccount | undefined {
    return this.accounts.get(accountId);
  }

  getAccounts(): SandboxAccount[] {
    return [...this.accounts.values()];
  }

  /**
   * Adds or replaces a transaction item (by transactionId) on an account.
   * Items are served as given, so malformed payloads can be simulated.
   */
  putTransaction(accountId: string, item: Record<string, unknown>): void {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new Error(`Sandbox account ${accountId} does not exist`);
    }
    const rawId = item['transactionId'] ?? item['external_id'];
    const id = typeof rawId === 'string' ? rawId : randomUUID();
    account.extraItems.set(id, item);
  }

  setBalance(accountId: string, balanceMinor: number, availableBalanceMinor = balanceMinor): void {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new Error(`Sandbox account ${accountId} does not exist`);
    }
    account.balanceMinor = balanceMinor;
    account.availableBalanceMinor = availableBalanceMinor;
  }

  // ==================== INTERNALS ====================

  private consumeFault(operation: SandboxOperation): void {
    const fault = this.faults.find(f => f.operation === operation && f.remaining > 0);
    if (fault) {
      fault.remaining--;
      throw fault.error;
    }
  }

  private authorize(accessToken: string): SandboxAccount {
    const grant = this.accessTokens.get(accessToken);
    if (!grant || grant.expiresAt <= this.now().getTime()) {
      throw new AuthError('Sandbox access token is invalid or expired');
    }
    const account = this.accounts.get(grant.accountId);
    if (!account) {
      throw new AuthError('Sandbox account was closed');
    }
    return account;
  }

  private issueTokens(accountId: string): SandboxTokenResponse {
    const accessToken = `sandbox-access-${randomUUID()}`;
    const refreshToken = `sandbox-refresh-${randomUUID()}`;
    this.accessTokens.set(accessToken, {
      accountId,
      expiresAt: this.now().getTime() + this.tokenLifetime * 1000
    });
    this.refreshTokens.set(refreshToken, accountId);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      expires_in: this.tokenLifetime,
      token_type: 'Bearer',
      scope: SANDBOX_SCOPE
    };
  }

  private openAccount(providerSlug: string, code: string): SandboxAccount {
    const random = createRandom(hashSeed(this.seed, providerSlug, code));
    const balanceMinor = Math.round((1000 + random() * 49_000) * 100);
    const account: SandboxAccount = {
      accountId: `sandbox-acc-${digits(random, 10)}`,
      providerSlug,
      agency: digits(random, 4),
      accountNumber: digits(random, 8),
      checkDigit: digits(random, 1),
      balanceMinor,
      availableBalanceMinor: balanceMinor,
      extraItems: new Map()
    };
    this.accounts.set(account.accountId, account);
    return account;
  }

  private history(account: SandboxAccount, from: string, to: string): Record<string, unknown>[] {
    const start = Date.parse(`${from}T00:00:00.000Z`);
    const end = Date.parse(`${to}T00:00:00.000Z`);
    const byId = new Map<string, Record<string, unknown>>();

    for (let day = start; day <= end; day += DAY_MS) {
      const date = new Date(day).toISOString().slice(0, 10);
      for (const item of this.generateDay(account.accountId, date)) {
        byId.set(String(item['transactionId']), item);
      }
    }

    for (const [id, item] of account.extraItems) {
      const booked = typeof item['bookingDateTime'] === 'string' ? item['bookingDateTime'].slice(0, 10) : undefined;
      if (booked === undefined || (booked >= from && booked <= to)) {
        byId.set(id, item);
      }
    }

    return [...byId.values()].sort((a, b) => {
      const left = `${String(a['bookingDateTime'] ?? '')}|${String(a['transactionId'] ?? '')}`;
      const right = `${String(b['bookingDateTime'] ?? '')}|${String(b['transactionId'] ?? '')}`;
      return left.localeCompare(right);
    });
  }

  private generateDay(accountId: string, date: string): Record<string, unknown>[] {
    const random = createRandom(hashSeed(this.seed, accountId, date));
    const count = Math.floor(random() * (this.maxPerDay + 1));
    const items: Record<string, unknown>[] = [];

    for (let i = 0; i < count; i++) {
      const template = templates[Math.floor(random() * templates.length)];
      const value = template.min + random() * (template.max - template.min);
      const counterpart = template.counterparts.length > 0
        ? template.counterparts[Math.floor(random() * template.counterparts.length)]
        : undefined;
      const hour = String(8 + Math.floor(random() * 10)).padStart(2, '0');
      const minute = String(Math.floor(random() * 60)).padStart(2, '0');
      const isCredit = template.creditDebitType === 'CREDITO';

      items.push({
        transactionId: `${accountId}-${date.replace(/-/g, '')}-${i}`,
        type: template.type,
        creditDebitType: template.creditDebitType,
        amount: { amount: value.toFixed(2), currency: 'BRL' },
        bookingDateTime: `${date}T${hour}:${minute}:00.000Z`,
        transactionName: counterpart ? `${template.name} - ${counterpart}` : template.name,
        ...(counterpart ? (isCredit ? { debtorName: counterpart } : { creditorName: counterpart }) : {}),
        status: 'BOOKED'
      });
    }
    return items;
  }
}
