/**
 * Consent Service
 *
 * Drives the OAuth2 authorization code flow: consent creation, the callback
 * that redeems the code, and creation of the resulting bank connection.
 */

import { randomUUID } from 'crypto';
import type { AccountPermission, BankConnectionView } from '../../shared/types';
import { ACCOUNT_PERMISSIONS } from '../../shared/types';
import * as db from '../database/database';
import { InvalidGrantError, ValidationError } from '../utils/errors';
import { CONSENT_TTL_SECONDS, scopeForPermissions, type BankConnector, type RequestOptions, type TokenSet } from './base-connector';
import { requireProvider, sealTokens } from './token-manager';

const CODE_CHARSET = /^[A-Za-z0-9._~-]{8,512}$/;
const AGENCY_FORMAT = /^\d{4}$/;
const ACCOUNT_NUMBER_FORMAT = /^\d{1,20}$/;

export interface ConsentInitiation {
  consentId: string;
  authorizationUrl: string;
  expiresIn: number;
}

export class ConsentService {
  constructor(private readonly connector: BankConnector) {}

  initiateConsent(
    providerCode: string,
    companyId: string,
    permissions: AccountPermission[] = [...ACCOUNT_PERMISSIONS]
  ): ConsentInitiation {
    const provider = requireProvider(providerCode);
    const now = new Date();
    const consentId = this.connector.createConsentId();
    const state = randomUUID();
    const nonce = randomUUID();

    db.insertConsent({
      id: consentId,
      companyId,
      providerCode: provider.code,
      permissions,
      state,
      nonce,
      status: 'awaiting_authorisation',
      expiresAt: new Date(now.getTime() + CONSENT_TTL_SECONDS * 1000).toISOString(),
      createdAt: now.toISOString()
    });

    const authorizationUrl = this.connector.buildAuthorizationUrl(provider, {
      consentId,
      state,
      nonce,
      scope: scopeForPermissions(permissions)
    });

    console.log(`[Consent] Created consent ${consentId} for company ${companyId} at provider ${provider.code}`);
    return { consentId, authorizationUrl, expiresIn: CONSENT_TTL_SECONDS };
  }

  /**
   * Redeems an authorization code at the provider's token endpoint.
   */
  async exchangeCode(providerCode: string, code: string, options?: RequestOptions): Promise<TokenSet> {
    const provider = requireProvider(providerCode);
    if (!CODE_CHARSET.test(code) || !code.startsWith(provider.authCodePrefix)) {
      throw new InvalidGrantError('Authorization code is malformed');
    }
    return this.connector.exchangeCode(provider, code, options);
  }

  /**
   * Handles the redirect back from the bank: verifies state, redeems the code,
   * reads the account identity and creates (or reactivates) the connection.
   */
  async completeConsent(state: string, code: string, options?: RequestOptions): Promise<BankConnectionView> {
    const consent = db.getConsentByState(state);
    if (!consent) {
      throw new ValidationError('Unknown consent state');
    }
    if (consent.status !== 'awaiting_authorisation') {
      throw new InvalidGrantError(`Consent ${consent.id} is ${consent.status}`);
    }
    if (Date.parse(consent.expiresAt) <= Date.now()) {
      db.updateConsentStatus(consent.id, 'expired');
      throw new InvalidGrantError(`Consent ${consent.id} has expired`);
    }

    let tokens: TokenSet;
    try {
      tokens = await this.exchangeCode(consent.providerCode, code, options);
    } catch (error) {
      if (error instanceof InvalidGrantError) {
        db.updateConsentStatus(consent.id, 'rejected');
      }
      throw error;
    }

    const provider = requireProvider(consent.providerCode);
    const account = await this.connector.getAccountInfo(provider, tokens.accessToken, options);
    // The code is spent, so a bad account identity ends the consent
    if (!AGENCY_FORMAT.test(account.agency)) {
      db.updateConsentStatus(consent.id, 'rejected');
      throw new ValidationError(`Invalid agency number: ${account.agency}`);
    }
    if (!ACCOUNT_NUMBER_FORMAT.test(account.accountNumber)) {
      db.updateConsentStatus(consent.id, 'rejected');
      throw new ValidationError(`Invalid account number: ${account.accountNumber}`);
    }

    const connection = db.upsertConnection(
      {
        companyId: consent.companyId,
        providerCode: provider.code,
        agency: account.agency,
        accountNumber: account.accountNumber,
        accountDigit: account.checkDigit,
        externalAccountId: account.accountId,
        currency: account.currency
      },
      sealTokens(tokens)
    );
    db.updateConsentStatus(consent.id, 'authorised', connection.id);

    console.log(`[Consent] Consent ${consent.id} authorised; connection ${connection.id} is active`);
    return db.toConnectionView(connection);
  }
}
