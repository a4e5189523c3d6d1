import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { z } from 'zod';
import * as db from './database/database';
import type { SandboxConnector } from './connectors/sandbox/sandbox-connector';
import { createSandboxConnector, resetDatabase, TEST_COMPANY, TEST_PROVIDER } from './testing/fixtures';
import { createApp } from './server';
import { configureServices } from './services';

interface ApiResponse {
  status: number;
  body: unknown;
}

let server: Server;
let baseUrl: string;
let connector: SandboxConnector;

async function call(method: string, path: string, body?: unknown): Promise<ApiResponse> {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const text = await response.text();
  return { status: response.status, body: text ? JSON.parse(text) : null };
}

const IdSchema = z.object({ id: z.string() });

/**
 * Walks the consent flow through the HTTP surface and returns the connection id.
 */
async function connectThroughApi(): Promise<string> {
  const consent = await call('POST', '/api/connections/consents', { providerCode: TEST_PROVIDER, companyId: TEST_COMPANY });
  expect(consent.status).toBe(201);
  const { authorizationUrl } = z.object({ authorizationUrl: z.string().url() }).parse(consent.body);

  const authorize = new URL(authorizationUrl);
  const redirect = await fetch(`${baseUrl}${authorize.pathname}${authorize.search}`, { redirect: 'manual' });
  expect(redirect.status).toBe(302);
  const location = new URL(redirect.headers.get('location') ?? '');
  expect(location.pathname).toBe('/api/connections/callback');

  const callback = await call('GET', `/api/connections/callback${location.search}`);
  expect(callback.status).toBe(201);
  expect(callback.body).toMatchObject({ status: 'active', companyId: TEST_COMPANY });
  return IdSchema.parse(callback.body).id;
}

beforeAll(async () => {
  resetDatabase();
  connector = createSandboxConnector();
  configureServices({ connector });

  server = createApp().listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

describe('API', () => {
  it('reports health', async () => {
    const { status, body } = await call('GET', '/api/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('lists providers without internal fields', async () => {
    const { body } = await call('GET', '/api/providers');
    const { providers } = z.object({ providers: z.array(z.record(z.unknown())) }).parse(body);

    expect(providers.find(p => p['code'] === TEST_PROVIDER)).toMatchObject({ slug: 'itau', isActive: true });
    expect(providers.every(p => !('authCodePrefix' in p))).toBe(true);
  });

  it('connects, syncs, categorizes and learns from a correction', async () => {
    const connectionId = await connectThroughApi();
    const accountId = db.getConnectionById(connectionId)?.externalAccountId ?? '';
    connector.bank.putTransaction(accountId, {
      transactionId: 'api-1',
      type: 'PIX_RECEBIDO',
      creditDebitType: 'CREDITO',
      amount: { amount: '250.00', currency: 'BRL' },
      bookingDateTime: new Date().toISOString(),
      transactionName: 'PIX recebido - Cliente API'
    });

    const rule = await call('POST', '/api/rules', {
      companyId: TEST_COMPANY,
      categoryId: 'system-vendas',
      name: 'Cliente API',
      ruleType: 'keyword',
      conditions: { keywords: ['cliente api'] },
      confidenceThreshold: 0.9
    });
    expect(rule.status).toBe(201);

    const sync = await call('POST', `/api/connections/${connectionId}/sync`, { daysBack: 3 });
    expect(sync.status).toBe(200);
    expect(sync.body).toMatchObject({ status: 'completed', connectionId });

    const bulk = await call('POST', '/api/categorization/uncategorized', { companyId: TEST_COMPANY });
    expect(bulk.status).toBe(200);
    expect(bulk.body).toMatchObject({ failed: 0 });

    const transactionId = db.getTransactionByExternalId(connectionId, 'api-1')?.id ?? '';
    const detail = await call('GET', `/api/transactions/${transactionId}`);
    expect(detail.body).toMatchObject({
      transaction: { categoryId: 'system-vendas', categorizationMethod: 'rule', amountMinor: 25000 },
      decisions: [{ method: 'rule', confidence: 0.9 }]
    });

    const correction = await call('POST', `/api/transactions/${transactionId}/correction`, {
      categoryId: 'system-servicos',
      reviewedBy: 'ana'
    });
    expect(correction.status).toBe(201);
    expect(correction.body).toMatchObject({ decision: { wasAccepted: false, finalCategoryId: 'system-servicos' } });

    const rerun = await call('POST', `/api/transactions/${transactionId}/categorize`);
    expect(rerun.status).toBe(409);

    const accuracy = await call('GET', `/api/categorization/accuracy?companyId=${TEST_COMPANY}`);
    expect(accuracy.body).toMatchObject({ reviewedDecisions: 1, acceptedDecisions: 0 });

    const runs = await call('GET', `/api/connections/${connectionId}/sync-runs`);
    expect(runs.body).toMatchObject({ runs: [{ status: 'completed' }] });
  });

  it('rejects the consent when the user denies it at the bank', async () => {
    const consent = await call('POST', '/api/connections/consents', { providerCode: TEST_PROVIDER, companyId: TEST_COMPANY });
    const { consentId, authorizationUrl } = z.object({ consentId: z.string(), authorizationUrl: z.string() }).parse(consent.body);
    const state = new URL(authorizationUrl).searchParams.get('state') ?? '';

    const callback = await call('GET', `/api/connections/callback?state=${state}&error=access_denied`);

    expect(callback.status).toBe(400);
    expect(callback.body).toMatchObject({ error: 'Authorisation was not granted: access_denied' });
    expect(db.getConsentById(consentId)?.status).toBe('rejected');
  });

  it('refuses a sandbox authorization for another redirect URI', async () => {
    const consent = await call('POST', '/api/connections/consents', { providerCode: TEST_PROVIDER, companyId: TEST_COMPANY });
    const { authorizationUrl } = z.object({ authorizationUrl: z.string() }).parse(consent.body);
    const authorize = new URL(authorizationUrl);
    authorize.searchParams.set('redirect_uri', 'https://attacker.example/callback');

    const response = await call('GET', `${authorize.pathname}${authorize.search}`);
    expect(response.status).toBe(400);
  });

  it('validates request bodies', async () => {
    const response = await call('POST', '/api/connections/consents', { providerCode: TEST_PROVIDER });
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('answers unknown routes with 404', async () => {
    const response = await call('GET', '/api/nothing-here');
    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({ code: 'NOT_FOUND' });
  });
});
