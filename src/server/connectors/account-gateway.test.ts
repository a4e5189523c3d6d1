import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { BankConnection } from '../database/database';
import { ValidationError } from '../utils/errors';
import { connectSandboxAccount, createSandboxConnector, resetDatabase } from '../testing/fixtures';
import { AccountGateway, type TransactionBatch } from './account-gateway';
import type { SandboxConnector } from './sandbox/sandbox-connector';
import { TokenManager } from './token-manager';

const RANGE = { from: '2024-03-08', to: '2024-03-15' };

function booked(transactionId: string) {
  return {
    transactionId,
    amount: { amount: '10.00', currency: 'BRL' },
    bookingDateTime: '2024-03-14T10:00:00.000Z'
  };
}

describe('AccountGateway', () => {
  let connector: SandboxConnector;
  let tokens: TokenManager;
  let connection: BankConnection;

  beforeEach(async () => {
    resetDatabase();
    connector = createSandboxConnector({ pageSize: 2 });
    tokens = new TokenManager(connector);
    connection = await connectSandboxAccount(connector);
  });

  it('refuses a connection without a linked account, without refreshing', async () => {
    const refresh = vi.spyOn(tokens, 'refresh');
    const gateway = new AccountGateway(connector, tokens);

    await expect(
      gateway.fetchTransactionBatch({ ...connection, externalAccountId: undefined }, RANGE, 1)
    ).rejects.toBeInstanceOf(ValidationError);
    expect(refresh).not.toHaveBeenCalled();
  });

  it('refreshes once when the bank rejects the access token', async () => {
    const refresh = vi.spyOn(tokens, 'refresh');
    connector.bank.expireAccessTokens();

    const account = await new AccountGateway(connector, tokens).getAccountInfo(connection);

    expect(account.accountId).toBe(connection.externalAccountId);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('collects every page of the window', async () => {
    const accountId = connection.externalAccountId ?? '';
    connector.bank.putTransaction(accountId, booked('all-1'));
    connector.bank.putTransaction(accountId, { transactionId: 'all-broken', bookingDateTime: '2024-03-14T10:00:00.000Z' });

    const result = await new AccountGateway(connector, tokens).getTransactions(connection, RANGE);

    expect(result.truncated).toBe(false);
    expect(result.transactions.map(t => t.externalId)).toContain('all-1');
    expect(result.skipped.map(item => item.externalId)).toEqual(['all-broken']);
  });

  it('reports a pass cut short by the page cap', async () => {
    const accountId = connection.externalAccountId ?? '';
    for (let i = 1; i <= 5; i++) {
      connector.bank.putTransaction(accountId, booked(`cap-${i}`));
    }

    const pages = new AccountGateway(connector, tokens, 2).transactionPages(connection, RANGE);
    const batches: TransactionBatch[] = [];
    let next = await pages.next();
    while (!next.done) {
      batches.push(next.value);
      next = await pages.next();
    }

    expect(batches.map(b => b.page)).toEqual([1, 2]);
    expect(next.value).toEqual({ pages: 2, truncated: true });
  });
});
