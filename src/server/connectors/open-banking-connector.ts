/**
 * Open Banking Connector
 *
 * Production connector for the Open Banking network: OAuth2 authorization
 * code flow with private_key_jwt client authentication over mutual TLS,
 * and the accounts/transactions resource APIs.
 */

import { randomUUID, type KeyObject } from 'crypto';
import type { BankProvider } from '../../shared/types';
import type {
  AccountInfo,
  AuthorizationRequest,
  BankConnector,
  DateRange,
  RawTransactionPage,
  RequestOptions,
  TokenSet
} from './base-connector';
import { CLIENT_ASSERTION_TYPE, createClientAssertion } from './client-assertion';
import { readJsonResponse, type HttpTransport } from './http-transport';
import { parseAccountResponse, parseTokenResponse, parseTransactionPage } from './parsers';

export interface OpenBankingConnectorOptions {
  baseUrl: string;
  clientId: string;
  redirectUri: string;
  signingKey: KeyObject;
  transport: HttpTransport;
  customerUserAgent?: string;
}

export class OpenBankingConnector implements BankConnector {
  readonly mode = 'production' as const;

  constructor(private readonly options: OpenBankingConnectorOptions) {}

  createConsentId(): string {
    return `urn:consent:${randomUUID()}`;
  }

  buildAuthorizationUrl(provider: BankProvider, request: AuthorizationRequest): string {
    const url = new URL(`${this.options.baseUrl}/${provider.slug}/oauth/authorize`);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.options.clientId);
    url.searchParams.set('scope', request.scope);
    url.searchParams.set('redirect_uri', this.options.redirectUri);
    url.searchParams.set('consent_id', request.consentId);
    url.searchParams.set('state', request.state);
    url.searchParams.set('nonce', request.nonce);
    return url.toString();
  }

  async exchangeCode(provider: BankProvider, code: string, options?: RequestOptions): Promise<TokenSet> {
    return this.tokenRequest(provider, {
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.options.redirectUri
    }, options);
  }

  async refreshTokens(provider: BankProvider, refreshToken: string, options?: RequestOptions): Promise<TokenSet> {
    return this.tokenRequest(provider, {
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    }, options);
  }

  async getAccountInfo(provider: BankProvider, accessToken: string, options?: RequestOptions): Promise<AccountInfo> {
    const body = await this.resourceRequest(`${this.options.baseUrl}/${provider.slug}/accounts`, accessToken, options);
    return parseAccountResponse(body);
  }

  async getTransactionPage(
    provider: BankProvider,
    accessToken: string,
    accountId: string,
    range: DateRange,
    page: number,
    options?: RequestOptions
  ): Promise<RawTransactionPage> {
    const url = new URL(`${this.options.baseUrl}/${provider.slug}/accounts/${encodeURIComponent(accountId)}/transactions`);
    url.searchParams.set('fromBookingDate', range.from);
    url.searchParams.set('toBookingDate', range.to);
    url.searchParams.set('page', String(page));

    const body = await this.resourceRequest(url.toString(), accessToken, options);
    return parseTransactionPage(body, page);
  }

  private async tokenRequest(
    provider: BankProvider,
    grant: Record<string, string>,
    options?: RequestOptions
  ): Promise<TokenSet> {
    const tokenEndpoint = `${this.options.baseUrl}/${provider.slug}/oauth/token`;
    const form = new URLSearchParams({
      ...grant,
      client_id: this.options.clientId,
      client_assertion_type: CLIENT_ASSERTION_TYPE,
      client_assertion: createClientAssertion({
        clientId: this.options.clientId,
        audience: tokenEndpoint,
        privateKey: this.options.signingKey
      })
    });

    const response = await this.options.transport.send({
      method: 'POST',
      url: tokenEndpoint,
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json',
        'x-fapi-interaction-id': randomUUID()
      },
      body: form.toString(),
      signal: options?.signal
    });

    return parseTokenResponse(readJsonResponse(response));
  }

  private async resourceRequest(url: string, accessToken: string, options?: RequestOptions): Promise<unknown> {
    const response = await this.options.transport.send({
      method: 'GET',
      url,
      headers: {
        authorization: `Bearer ${accessToken}`,
        accept: 'application/json',
        'x-fapi-interaction-id': randomUUID(),
        'x-fapi-auth-date': new Date().toUTCString(),
        'x-customer-user-agent': this.options.customerUserAgent ?? 'bank-sync-engine'
      },
      signal: options?.signal
    });
    return readJsonResponse(response);
  }
}
