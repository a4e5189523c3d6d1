/**
 * Client Assertion
 *
 * private_key_jwt client authentication: a PS256-signed JWT sent with every
 * token request instead of a client secret.
 */

import * as crypto from 'crypto';

export interface ClientAssertionOptions {
  clientId: string;
  audience: string;
  privateKey: crypto.KeyObject;
  keyId?: string;
  lifetimeSeconds?: number;
  now?: Date;
}

export const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

function base64url(value: string | Buffer): string {
  return Buffer.from(value).toString('base64url');
}

export function createClientAssertion(options: ClientAssertionOptions): string {
  const iat = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const header = { alg: 'PS256', typ: 'JWT', ...(options.keyId ? { kid: options.keyId } : {}) };
  const claims = {
    iss: options.clientId,
    sub: options.clientId,
    aud: options.audience,
    jti: crypto.randomUUID(),
    iat,
    exp: iat + (options.lifetimeSeconds ?? 300)
  };

  const signingInput = `${base64url(JSON.stringify(header))}.${base64url(JSON.stringify(claims))}`;
  const signature = crypto.sign('sha256', Buffer.from(signingInput), {
    key: options.privateKey,
    padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
    saltLength: 32
  });

  return `${signingInput}.${base64url(signature)}`;
}

export function loadSigningKey(pem: string | Buffer): crypto.KeyObject {
  return crypto.createPrivateKey(pem);
}
