/**
 * Token Manager
 *
 * Keeps a connection's access token usable. Refreshes are single-flight per
 * connection: concurrent callers share the one in-flight refresh.
 *
 * The shared refresh runs under no caller's signal (the transport's own
 * timeouts bound it). Each caller only stops waiting when its own signal aborts.
 */

import type { BankProvider } from '../../shared/types';
import * as db from '../database/database';
import type { BankConnection } from '../database/database';
import { EncryptedToken } from '../utils/encryption';
import { abortable } from '../utils/abort';
import { AuthError, InvalidGrantError, ProviderNotFoundError, errorMessage } from '../utils/errors';
import type { OAuthConnector, RequestOptions, TokenSet } from './base-connector';

/** Tokens this close to expiry are refreshed before use. */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;

export function requireProvider(code: string): BankProvider {
  const provider = db.getProviderByCode(code);
  if (!provider || !provider.isActive) {
    throw new ProviderNotFoundError(code);
  }
  return provider;
}

export function sealTokens(tokens: TokenSet, now = new Date()): db.SealedTokens {
  return {
    accessTokenEncrypted: EncryptedToken.seal(tokens.accessToken).toCiphertext(),
    refreshTokenEncrypted: tokens.refreshToken ? EncryptedToken.seal(tokens.refreshToken).toCiphertext() : undefined,
    tokenExpiresAt: new Date(now.getTime() + tokens.expiresIn * 1000).toISOString()
  };
}

export class TokenManager {
  private readonly inFlight = new Map<string, Promise<TokenSet>>();

  constructor(private readonly connector: OAuthConnector) {}

  /**
   * Refreshes the connection's tokens. A terminal failure (revoked or invalid
   * grant) marks the connection expired; transient failures leave its status alone.
   */
  refresh(connectionId: string, options?: RequestOptions): Promise<TokenSet> {
    let shared = this.inFlight.get(connectionId);
    if (!shared) {
      shared = this.performRefresh(connectionId).finally(() => {
        this.inFlight.delete(connectionId);
      });
      this.inFlight.set(connectionId, shared);
    }
    return options?.signal ? abortable(shared, options.signal) : shared;
  }

  isRefreshing(connectionId: string): boolean {
    return this.inFlight.has(connectionId);
  }

  /**
   * Returns a usable access token, refreshing first when it is about to expire.
   */
  async getAccessToken(connection: BankConnection, options?: RequestOptions): Promise<string> {
    if (this.inFlight.has(connection.id)) {
      return (await this.refresh(connection.id, options)).accessToken;
    }

    // The caller's copy may predate a refresh
    const current = db.getConnectionById(connection.id) ?? connection;
    const expiresAt = current.tokenExpiresAt ? Date.parse(current.tokenExpiresAt) : 0;
    if (!current.accessTokenEncrypted || expiresAt - TOKEN_REFRESH_MARGIN_MS <= Date.now()) {
      const tokens = await this.refresh(current.id, options);
      return tokens.accessToken;
    }
    return EncryptedToken.fromCiphertext(current.accessTokenEncrypted).reveal();
  }

  private async performRefresh(connectionId: string): Promise<TokenSet> {
    // Re-read so a refresh that just finished elsewhere is not repeated with a stale token
    const connection = db.getConnectionById(connectionId);
    if (!connection) {
      throw new AuthError(`Connection ${connectionId} not found`);
    }
    if (!connection.refreshTokenEncrypted) {
      db.updateConnectionStatus(connectionId, 'expired', 'No refresh token available');
      throw new AuthError('Connection has no refresh token; re-authorization required');
    }

    const provider = requireProvider(connection.providerCode);
    const refreshToken = EncryptedToken.fromCiphertext(connection.refreshTokenEncrypted).reveal();

    try {
      const tokens = await this.connector.refreshTokens(provider, refreshToken);
      db.updateConnectionTokens(connectionId, sealTokens(tokens));
      console.log(`[TokenManager] Refreshed tokens for connection ${connectionId}`);
      return tokens;
    } catch (error) {
      if (error instanceof InvalidGrantError || error instanceof AuthError) {
        console.error(`[TokenManager] Refresh rejected for connection ${connectionId}:`, error.message);
        db.updateConnectionStatus(connectionId, 'expired', error.message);
      } else {
        console.error(`[TokenManager] Refresh failed for connection ${connectionId}:`, errorMessage(error));
      }
      throw error;
    }
  }
}
