import { describe, it, expect } from 'vitest';
import { EncryptedToken, deriveKey } from './encryption';

describe('EncryptedToken', () => {
  it('round-trips a token under the configured key', () => {
    const sealed = EncryptedToken.seal('test-access-token');
    expect(EncryptedToken.fromCiphertext(sealed.toCiphertext()).reveal()).toBe('test-access-token');
  });

  it('uses a fresh IV for every seal', () => {
    const a = EncryptedToken.seal('same');
    const b = EncryptedToken.seal('same');
    expect(a.toCiphertext()).not.toBe(b.toCiphertext());
  });

  it('never prints the plaintext', () => {
    const sealed = EncryptedToken.seal('test-secret');
    expect(String(sealed)).toBe('[EncryptedToken]');
    expect(JSON.stringify({ token: sealed })).toBe('{"token":"[EncryptedToken]"}');
  });

  it('refuses to reveal under another key', () => {
    const sealed = EncryptedToken.seal('test-secret', deriveKey('key-a'));
    expect(() => sealed.reveal(deriveKey('key-b'))).toThrow();
    expect(sealed.reveal(deriveKey('key-a'))).toBe('test-secret');
  });

  it('detects tampering and truncation', () => {
    const bytes = Buffer.from(EncryptedToken.seal('test-secret').toCiphertext(), 'base64');
    bytes[bytes.length - 1] ^= 0xff;

    expect(() => EncryptedToken.fromCiphertext(bytes.toString('base64')).reveal()).toThrow();
    expect(() => EncryptedToken.fromCiphertext('AAAA').reveal()).toThrow('Encrypted token is truncated');
  });
});
