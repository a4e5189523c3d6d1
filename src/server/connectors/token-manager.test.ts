import { describe, it, expect, beforeEach } from 'vitest';
import type { BankProvider } from '../../shared/types';
import * as db from '../database/database';
import type { BankConnection } from '../database/database';
import { EncryptedToken } from '../utils/encryption';
import { AuthError, InvalidGrantError, ProviderUnavailableError } from '../utils/errors';
import { connectSandboxAccount, createSandboxConnector, createTestConnection, resetDatabase } from '../testing/fixtures';
import type { AuthorizationRequest, OAuthConnector, RequestOptions, TokenSet } from './base-connector';
import type { SandboxConnector } from './sandbox/sandbox-connector';
import { TokenManager } from './token-manager';

/**
 * Counts refresh calls reaching the bank; everything else goes to the sandbox.
 */
class CountingConnector implements OAuthConnector {
  readonly mode = 'sandbox' as const;
  refreshCalls = 0;

  constructor(private readonly inner: SandboxConnector) {}

  createConsentId(): string {
    return this.inner.createConsentId();
  }

  buildAuthorizationUrl(provider: BankProvider, request: AuthorizationRequest): string {
    return this.inner.buildAuthorizationUrl(provider, request);
  }

  exchangeCode(provider: BankProvider, code: string, options?: RequestOptions): Promise<TokenSet> {
    return this.inner.exchangeCode(provider, code, options);
  }

  async refreshTokens(provider: BankProvider, refreshToken: string, options?: RequestOptions): Promise<TokenSet> {
    this.refreshCalls++;
    // Yield so concurrent callers overlap
    await new Promise(resolve => setTimeout(resolve, 5));
    return this.inner.refreshTokens(provider, refreshToken, options);
  }
}

describe('TokenManager', () => {
  let sandbox: SandboxConnector;
  let connector: CountingConnector;
  let tokens: TokenManager;
  let connection: BankConnection;

  beforeEach(async () => {
    resetDatabase();
    sandbox = createSandboxConnector();
    connector = new CountingConnector(sandbox);
    tokens = new TokenManager(connector);
    connection = await connectSandboxAccount(sandbox);
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    const [a, b, c] = await Promise.all([
      tokens.refresh(connection.id),
      tokens.refresh(connection.id),
      tokens.refresh(connection.id)
    ]);

    expect(connector.refreshCalls).toBe(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(tokens.isRefreshing(connection.id)).toBe(false);
  });

  it('keeps the shared refresh going when one caller aborts', async () => {
    const controller = new AbortController();
    const first = tokens.refresh(connection.id, { signal: controller.signal });
    const second = tokens.refresh(connection.id);
    controller.abort(new Error('first caller timed out'));

    await expect(first).rejects.toThrow('first caller timed out');
    const refreshed = await second;

    expect(connector.refreshCalls).toBe(1);
    const stored = db.getConnectionById(connection.id);
    expect(EncryptedToken.fromCiphertext(stored?.accessTokenEncrypted ?? '').reveal()).toBe(refreshed.accessToken);
    expect(stored?.status).toBe('active');
  });

  it('stores the rotated tokens sealed', async () => {
    const refreshed = await tokens.refresh(connection.id);

    const stored = db.getConnectionById(connection.id);
    expect(stored?.accessTokenEncrypted).toBeDefined();
    expect(stored?.accessTokenEncrypted).not.toBe(refreshed.accessToken);
    expect(EncryptedToken.fromCiphertext(stored?.accessTokenEncrypted ?? '').reveal()).toBe(refreshed.accessToken);
    expect(stored?.status).toBe('active');
  });

  it('uses the rotated refresh token for the next refresh', async () => {
    await tokens.refresh(connection.id);
    await tokens.refresh(connection.id);
    expect(connector.refreshCalls).toBe(2);
  });

  it('lets getAccessToken wait for a refresh already in flight', async () => {
    const refresh = tokens.refresh(connection.id);
    const accessToken = await tokens.getAccessToken(connection);

    expect(accessToken).toBe((await refresh).accessToken);
    expect(connector.refreshCalls).toBe(1);
  });

  it('returns the stored token while it is valid', async () => {
    const accessToken = await tokens.getAccessToken(connection);

    expect(accessToken).toBe(EncryptedToken.fromCiphertext(connection.accessTokenEncrypted ?? '').reveal());
    expect(connector.refreshCalls).toBe(0);
  });

  it('refreshes a token that is about to expire', async () => {
    db.updateConnectionTokens(connection.id, {
      accessTokenEncrypted: connection.accessTokenEncrypted ?? '',
      tokenExpiresAt: new Date(Date.now() + 30_000).toISOString()
    });

    await tokens.getAccessToken(connection);

    expect(connector.refreshCalls).toBe(1);
  });

  it('marks the connection expired when the grant is rejected', async () => {
    sandbox.bank.injectFault('token', new InvalidGrantError('Refresh token was revoked'));

    await expect(tokens.refresh(connection.id)).rejects.toBeInstanceOf(InvalidGrantError);

    const stored = db.getConnectionById(connection.id);
    expect(stored?.status).toBe('expired');
    expect(stored?.lastSyncError).toBe('Refresh token was revoked');
  });

  it('leaves the status alone on a transient failure', async () => {
    sandbox.bank.injectFault('token', new ProviderUnavailableError('bank down'));

    await expect(tokens.refresh(connection.id)).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(db.getConnectionById(connection.id)?.status).toBe('active');
  });

  it('expires a connection that has no refresh token', async () => {
    const bare = createTestConnection('company-2');

    await expect(tokens.refresh(bare.id)).rejects.toBeInstanceOf(AuthError);
    expect(db.getConnectionById(bare.id)?.status).toBe('expired');
  });
});
