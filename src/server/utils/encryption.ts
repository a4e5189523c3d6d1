/**
 * Encryption Utility
 *
 * OAuth tokens are stored as EncryptedToken values: AES-256-GCM with a unique
 * IV per seal. A token is only turned back into plaintext by reveal().
 *
 * The master key is derived from:
 * 1. ENCRYPTION_KEY environment variable (if set)
 * 2. Or a generated key stored next to the database (created on first run)
 */

import * as crypto from 'crypto';
import { dirname, join } from 'path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { config } from '../config/env';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 12; // 96 bits, the GCM standard nonce size
const AUTH_TAG_LENGTH = 16; // 128 bits
const KEY_SALT = 'bank-sync-token-vault';

/**
 * Get or create the master encryption key
 */
function getMasterKey(): Buffer {
  if (config.encryptionKey) {
    return crypto.scryptSync(config.encryptionKey, KEY_SALT, KEY_LENGTH);
  }

  // In-memory databases get an ephemeral key
  if (config.databasePath === ':memory:') {
    return crypto.randomBytes(KEY_LENGTH);
  }

  const dataDir = dirname(config.databasePath);
  const keyFile = join(dataDir, '.encryption-key');
  if (existsSync(keyFile)) {
    return Buffer.from(readFileSync(keyFile, 'utf8').trim(), 'hex');
  }

  console.log('[Encryption] Generating new encryption key...');
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  const newKey = crypto.randomBytes(KEY_LENGTH);
  writeFileSync(keyFile, newKey.toString('hex'), { mode: 0o600 }); // Read/write only for owner
  console.log('[Encryption] Encryption key saved to', keyFile);
  return newKey;
}

let masterKey: Buffer | null = null;

function defaultKey(): Buffer {
  if (!masterKey) {
    masterKey = getMasterKey();
  }
  return masterKey;
}

/**
 * Sealed secret. The plaintext never appears in toString() or JSON output.
 */
export class EncryptedToken {
  private constructor(private readonly ciphertext: string) {}

  /**
   * Encrypts plaintext into base64(IV + AuthTag + CipherText).
   */
  static seal(plaintext: string, key: Buffer = defaultKey()): EncryptedToken {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const combined = Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
    return new EncryptedToken(combined.toString('base64'));
  }

  static fromCiphertext(ciphertext: string): EncryptedToken {
    return new EncryptedToken(ciphertext);
  }

  /**
   * Decrypts the token. Throws when the ciphertext was tampered with or
   * sealed under a different key.
   */
  reveal(key: Buffer = defaultKey()): string {
    const combined = Buffer.from(this.ciphertext, 'base64');
    if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new Error('Encrypted token is truncated');
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const ciphertext = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(authTag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  }

  toCiphertext(): string {
    return this.ciphertext;
  }

  toString(): string {
    return '[EncryptedToken]';
  }

  toJSON(): string {
    return '[EncryptedToken]';
  }
}

export function deriveKey(secret: string): Buffer {
  return crypto.scryptSync(secret, KEY_SALT, KEY_LENGTH);
}
