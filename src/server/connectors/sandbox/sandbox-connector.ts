/**
 * Sandbox Connector
 *
 * BankConnector backed by the in-process SandboxBank. Responses go through
 * the same parsers as production payloads.
 */

import { randomUUID } from 'crypto';
import type { BankProvider } from '../../../shared/types';
import type {
  AccountInfo,
  AuthorizationRequest,
  BankConnector,
  DateRange,
  RawTransactionPage,
  RequestOptions,
  TokenSet
} from '../base-connector';
import { parseAccountResponse, parseTokenResponse, parseTransactionPage } from '../parsers';
import { SandboxBank } from './sandbox-bank';

export interface SandboxConnectorOptions {
  /** Base URL of the sandbox authorization page served by this application. */
  authorizeBaseUrl: string;
  clientId: string;
  redirectUri: string;
}

function throwIfAborted(options?: RequestOptions): void {
  if (options?.signal?.aborted) {
    throw options.signal.reason ?? new Error('Request aborted');
  }
}

export class SandboxConnector implements BankConnector {
  readonly mode = 'sandbox' as const;

  constructor(
    private readonly options: SandboxConnectorOptions,
    readonly bank: SandboxBank = new SandboxBank()
  ) {}

  createConsentId(): string {
    return `sandbox-consent-${randomUUID()}`;
  }

  buildAuthorizationUrl(provider: BankProvider, request: AuthorizationRequest): string {
    const url = new URL(`${this.options.authorizeBaseUrl}/${provider.slug}/oauth/authorize`);
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
    throwIfAborted(options);
    return parseTokenResponse(this.bank.exchangeCode(provider.slug, code));
  }

  async refreshTokens(_provider: BankProvider, refreshToken: string, options?: RequestOptions): Promise<TokenSet> {
    throwIfAborted(options);
    return parseTokenResponse(this.bank.refresh(refreshToken));
  }

  async getAccountInfo(_provider: BankProvider, accessToken: string, options?: RequestOptions): Promise<AccountInfo> {
    throwIfAborted(options);
    return parseAccountResponse(this.bank.accountInfo(accessToken));
  }

  async getTransactionPage(
    _provider: BankProvider,
    accessToken: string,
    accountId: string,
    range: DateRange,
    page: number,
    options?: RequestOptions
  ): Promise<RawTransactionPage> {
    throwIfAborted(options);
    return parseTransactionPage(this.bank.transactions(accessToken, accountId, range.from, range.to, page), page);
  }
}
