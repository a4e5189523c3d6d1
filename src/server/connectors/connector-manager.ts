/**
 * Connector Manager
 *
 * Chooses the banking backend from configuration: the Open Banking network
 * in production mode, the in-process sandbox otherwise.
 */

import { readFileSync } from 'fs';
import { config } from '../config/env';
import type { BankConnector } from './base-connector';
import { loadSigningKey } from './client-assertion';
import { MtlsTransport } from './http-transport';
import { OpenBankingConnector } from './open-banking-connector';
import { SandboxConnector } from './sandbox/sandbox-connector';

export const SANDBOX_ROUTE_PREFIX = '/api/banking/sandbox';

export function createConnector(): BankConnector {
  const banking = config.banking;

  if (banking.mode === 'production') {
    if (!banking.signingKeyPath) {
      throw new Error('SIGNING_KEY_PATH is required in production banking mode');
    }
    console.log(`[ConnectorManager] Using Open Banking connector at ${banking.baseUrl}`);
    return new OpenBankingConnector({
      baseUrl: banking.baseUrl,
      clientId: banking.clientId,
      redirectUri: banking.redirectUri,
      signingKey: loadSigningKey(readFileSync(banking.signingKeyPath)),
      transport: new MtlsTransport({
        certPath: banking.clientCertPath,
        keyPath: banking.clientKeyPath,
        caPath: banking.caCertPath,
        timeoutMs: banking.timeoutMs
      })
    });
  }

  const origin = new URL(banking.redirectUri).origin;
  console.log('[ConnectorManager] Using sandbox connector');
  return new SandboxConnector({
    authorizeBaseUrl: `${origin}${SANDBOX_ROUTE_PREFIX}`,
    clientId: banking.clientId,
    redirectUri: banking.redirectUri
  });
}
