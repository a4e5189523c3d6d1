/**
 * Account Gateway
 *
 * Connection-level access to account data: balances and paginated
 * transactions, authorized with the connection's current access token.
 * A rejected access token is refreshed once and the call retried.
 */

import type { BankConnection, TransactionInput } from '../database/database';
import { AuthError, ValidationError } from '../utils/errors';
import {
  MAX_TRANSACTION_PAGES,
  type AccountDataApi,
  type AccountInfo,
  type DateRange,
  type RequestOptions
} from './base-connector';
import { toTransactionInput } from './parsers';
import { requireProvider, type TokenManager } from './token-manager';

export interface SkippedItem {
  externalId?: string;
  reason: string;
}

export interface TransactionBatch {
  page: number;
  totalPages?: number;
  hasNext: boolean;
  transactions: TransactionInput[];
  skipped: SkippedItem[];
}

/** How a pagination pass ended. */
export interface PaginationOutcome {
  pages: number;
  /** The page cap was reached while the provider still reported more pages. */
  truncated: boolean;
}

export class AccountGateway {
  constructor(
    private readonly api: AccountDataApi,
    private readonly tokens: TokenManager,
    private readonly maxPages = MAX_TRANSACTION_PAGES
  ) {}

  async getAccountInfo(connection: BankConnection, options?: RequestOptions): Promise<AccountInfo> {
    const provider = requireProvider(connection.providerCode);
    return this.withAuthRetry(connection, options, async () => {
      const accessToken = await this.tokens.getAccessToken(connection, options);
      return this.api.getAccountInfo(provider, accessToken, options);
    });
  }

  /**
   * Fetches and validates one page. Malformed items are returned as skipped.
   */
  async fetchTransactionBatch(
    connection: BankConnection,
    range: DateRange,
    page: number,
    options?: RequestOptions
  ): Promise<TransactionBatch> {
    const provider = requireProvider(connection.providerCode);
    const accountId = connection.externalAccountId;
    if (!accountId) {
      throw new ValidationError(`Connection ${connection.id} has no linked account`);
    }

    const raw = await this.withAuthRetry(connection, options, async () => {
      const accessToken = await this.tokens.getAccessToken(connection, options);
      return this.api.getTransactionPage(provider, accessToken, accountId, range, page, options);
    });

    const batch: TransactionBatch = {
      page,
      totalPages: raw.totalPages,
      hasNext: raw.hasNext,
      transactions: [],
      skipped: []
    };
    for (const item of raw.items) {
      const parsed = toTransactionInput(item, connection.currency);
      if (parsed.ok) {
        batch.transactions.push(parsed.transaction);
      } else {
        batch.skipped.push({ externalId: parsed.externalId, reason: parsed.reason });
      }
    }
    return batch;
  }

  /**
   * Yields validated transaction pages until the provider reports no more,
   * or the page cap is reached.
   */
  async *transactionPages(
    connection: BankConnection,
    range: DateRange,
    options?: RequestOptions
  ): AsyncGenerator<TransactionBatch, PaginationOutcome> {
    for (let page = 1; page <= this.maxPages; page++) {
      const batch = await this.fetchTransactionBatch(connection, range, page, options);
      yield batch;
      if (!batch.hasNext) {
        return { pages: page, truncated: false };
      }
    }
    console.error(`[AccountGateway] Stopped after ${this.maxPages} pages for connection ${connection.id}; provider reports more`);
    return { pages: this.maxPages, truncated: true };
  }

  /**
   * All transactions in the window, collected across pages.
   */
  async getTransactions(
    connection: BankConnection,
    range: DateRange,
    options?: RequestOptions
  ): Promise<{ transactions: TransactionInput[]; skipped: SkippedItem[] } & PaginationOutcome> {
    const transactions: TransactionInput[] = [];
    const skipped: SkippedItem[] = [];
    const pages = this.transactionPages(connection, range, options);
    let next = await pages.next();
    while (!next.done) {
      transactions.push(...next.value.transactions);
      skipped.push(...next.value.skipped);
      next = await pages.next();
    }
    return { transactions, skipped, ...next.value };
  }

  private async withAuthRetry<T>(
    connection: BankConnection,
    options: RequestOptions | undefined,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (!(error instanceof AuthError) || options?.signal?.aborted) {
        throw error;
      }
      console.log(`[AccountGateway] Access token rejected for connection ${connection.id}; refreshing once`);
      await this.tokens.refresh(connection.id, options);
      return call();
    }
  }
}
