/**
 * Test fixtures: a clean in-memory database, sandbox-connected accounts and
 * hand-made transactions.
 */

import type { CanonicalTransaction } from '../../shared/types';
import * as db from '../database/database';
import type { BankConnection, TransactionInput } from '../database/database';
import { ConsentService } from '../connectors/consent-service';
import { SandboxBank, type SandboxBankOptions } from '../connectors/sandbox/sandbox-bank';
import { SandboxConnector } from '../connectors/sandbox/sandbox-connector';

export const TEST_COMPANY = 'company-1';
export const TEST_PROVIDER = '341';
export const TEST_PROVIDER_SLUG = 'itau';

export function resetDatabase(): void {
  db.initializeDatabase();
  db.clearAllData();
}

export function createSandboxConnector(options: SandboxBankOptions = {}): SandboxConnector {
  return new SandboxConnector(
    {
      authorizeBaseUrl: 'http://localhost:3000/api/banking/sandbox',
      clientId: 'sandbox-client',
      redirectUri: 'http://localhost:3000/api/connections/callback'
    },
    new SandboxBank(options)
  );
}

/**
 * Runs the full consent flow against the sandbox and returns the stored connection.
 */
export async function connectSandboxAccount(
  connector: SandboxConnector,
  companyId = TEST_COMPANY,
  providerCode = TEST_PROVIDER
): Promise<BankConnection> {
  const consents = new ConsentService(connector);
  const { authorizationUrl } = consents.initiateConsent(providerCode, companyId);
  const state = new URL(authorizationUrl).searchParams.get('state');
  if (!state) {
    throw new Error('Authorization URL carries no state');
  }

  const provider = db.getProviderByCode(providerCode);
  if (!provider) {
    throw new Error(`Unknown provider ${providerCode}`);
  }
  const code = connector.bank.issueAuthorizationCode(provider.slug);
  const view = await consents.completeConsent(state, code);

  const connection = db.getConnectionById(view.id);
  if (!connection) {
    throw new Error(`Connection ${view.id} was not stored`);
  }
  return connection;
}

/**
 * A connection row with placeholder tokens, for tests that never call the bank.
 */
export function createTestConnection(companyId = TEST_COMPANY, accountNumber = '12345678'): BankConnection {
  return db.upsertConnection(
    {
      companyId,
      providerCode: TEST_PROVIDER,
      agency: '0001',
      accountNumber,
      externalAccountId: `acc-${accountNumber}`,
      currency: 'BRL'
    },
    {
      accessTokenEncrypted: 'not-a-real-ciphertext',
      tokenExpiresAt: new Date(Date.now() + 3_600_000).toISOString()
    }
  );
}

let externalSeq = 0;

export function transactionInput(overrides: Partial<TransactionInput> = {}): TransactionInput {
  externalSeq++;
  return {
    externalId: `ext-${externalSeq}`,
    amountMinor: -5000,
    currency: 'BRL',
    transactionType: 'debit',
    description: 'Compra cartao',
    occurredAt: '2024-03-15T12:00:00.000Z',
    status: 'completed',
    ...overrides
  };
}

export function insertTransaction(
  connection: BankConnection,
  overrides: Partial<TransactionInput> = {}
): CanonicalTransaction {
  const [row] = db.upsertTransactionBatch(connection.id, connection.companyId, [transactionInput(overrides)]);
  const transaction = row ? db.getTransactionById(row.id) : null;
  if (!transaction) {
    throw new Error('Transaction was not stored');
  }
  return transaction;
}
