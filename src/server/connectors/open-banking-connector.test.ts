import { describe, it, expect, beforeEach } from 'vitest';
import { constants, generateKeyPairSync, verify } from 'crypto';
import type { BankProvider } from '../../shared/types';
import { InvalidGrantError } from '../utils/errors';
import { CLIENT_ASSERTION_TYPE, createClientAssertion } from './client-assertion';
import type { HttpRequest, HttpResponse, HttpTransport } from './http-transport';
import { OpenBankingConnector } from './open-banking-connector';

const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });

const provider: BankProvider = {
  code: '341',
  name: 'Itaú Unibanco',
  slug: 'itau',
  isActive: true,
  authCodePrefix: '',
  supportsPix: true
};

class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly responses: HttpResponse[] = [];

  reply(status: number, body: unknown): this {
    this.responses.push({ status, headers: {}, body: JSON.stringify(body) });
    return this;
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    const next = this.responses.shift();
    if (!next) throw new Error(`Unexpected request to ${req.url}`);
    return next;
  }
}

function decodeSegment(segment: string | undefined): unknown {
  return JSON.parse(Buffer.from(segment ?? '', 'base64url').toString('utf8'));
}

describe('createClientAssertion', () => {
  it('signs a PS256 JWT for the token endpoint', () => {
    const now = new Date('2024-03-15T12:00:00.000Z');
    const jwt = createClientAssertion({
      clientId: 'client-1',
      audience: 'https://bank.example/itau/oauth/token',
      privateKey,
      keyId: 'key-1',
      now
    });

    const [header, claims, signature] = jwt.split('.');
    expect(decodeSegment(header)).toEqual({ alg: 'PS256', typ: 'JWT', kid: 'key-1' });
    expect(decodeSegment(claims)).toMatchObject({
      iss: 'client-1',
      sub: 'client-1',
      aud: 'https://bank.example/itau/oauth/token',
      iat: 1710504000,
      exp: 1710504300
    });

    const valid = verify(
      'sha256',
      Buffer.from(`${header}.${claims}`),
      { key: publicKey, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: 32 },
      Buffer.from(signature ?? '', 'base64url')
    );
    expect(valid).toBe(true);
  });
});

describe('OpenBankingConnector', () => {
  let transport: FakeTransport;
  let connector: OpenBankingConnector;

  beforeEach(() => {
    transport = new FakeTransport();
    connector = new OpenBankingConnector({
      baseUrl: 'https://bank.example',
      clientId: 'client-1',
      redirectUri: 'https://app.example/api/connections/callback',
      signingKey: privateKey,
      transport
    });
  });

  it('builds the authorization URL for the provider', () => {
    const url = new URL(connector.buildAuthorizationUrl(provider, {
      consentId: 'urn:consent:1',
      state: 'state-1',
      nonce: 'nonce-1',
      scope: 'openid accounts'
    }));

    expect(url.origin + url.pathname).toBe('https://bank.example/itau/oauth/authorize');
    expect(url.searchParams.get('client_id')).toBe('client-1');
    expect(url.searchParams.get('redirect_uri')).toBe('https://app.example/api/connections/callback');
    expect(url.searchParams.get('consent_id')).toBe('urn:consent:1');
    expect(connector.createConsentId()).toMatch(/^urn:consent:/);
  });

  it('exchanges a code with a signed client assertion', async () => {
    transport.reply(200, { access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 900 });

    const tokens = await connector.exchangeCode(provider, 'code-123');

    expect(tokens).toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiresIn: 900,
      tokenType: 'Bearer',
      scope: undefined
    });

    const [request] = transport.requests;
    expect(request?.method).toBe('POST');
    expect(request?.url).toBe('https://bank.example/itau/oauth/token');
    const form = new URLSearchParams(request?.body);
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('code-123');
    expect(form.get('client_assertion_type')).toBe(CLIENT_ASSERTION_TYPE);
    expect(form.get('client_assertion')?.split('.')).toHaveLength(3);
  });

  it('surfaces invalid_grant on refresh', async () => {
    transport.reply(400, { error: 'invalid_grant' });
    await expect(connector.refreshTokens(provider, 'test-refresh')).rejects.toBeInstanceOf(InvalidGrantError);
  });

  it('reads account info with the bearer token', async () => {
    transport.reply(200, {
      data: [{ accountId: 'acc-1', branchCode: '0001', number: '998877', balance: { amount: '150.25', currency: 'BRL' } }]
    });

    const account = await connector.getAccountInfo(provider, 'test-access');

    expect(account).toMatchObject({
      accountId: 'acc-1',
      agency: '0001',
      accountNumber: '998877',
      balanceMinor: 15025,
      availableBalanceMinor: 15025,
      currency: 'BRL'
    });
    expect(transport.requests[0]?.headers.authorization).toBe('Bearer test-access');
  });

  it('requests a page of transactions for the booking window', async () => {
    transport.reply(200, {
      data: [{ transactionId: 't-1' }],
      links: { next: '/next' },
      meta: { totalPages: 3 }
    });

    const page = await connector.getTransactionPage(provider, 'test-access', 'acc 1', { from: '2024-03-01', to: '2024-03-15' }, 2);

    expect(page).toEqual({ items: [{ transactionId: 't-1' }], page: 2, totalPages: 3, hasNext: true });
    expect(transport.requests[0]?.url).toBe(
      'https://bank.example/itau/accounts/acc%201/transactions?fromBookingDate=2024-03-01&toBookingDate=2024-03-15&page=2'
    );
  });
});
