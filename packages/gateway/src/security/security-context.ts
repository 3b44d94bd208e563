/**
 * @file packages/gateway/src/security/security-context.ts
 * @description Process-wide key material and the two transforms composed by the uplink:
 *              XOR obfuscation and AES-256-CFB encryption.
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { CIPHER_ALGORITHM, KEY_LENGTH, NONCE_LENGTH } from '@fieldlink/shared';
import { CryptoError } from '../domain/errors/app-error.js';
import { xorWithSalt } from './obfuscation.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const BASE64_ANY_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

export interface SecurityOptions {
  /** base64 or base64url encoding of exactly 32 bytes. */
  aesKey?: string;
  obfuscationSalt: string;
}

/**
 * Holds the symmetric key and salt. Both are copied on construction and never
 * change afterwards, so concurrent callers share one instance without locking.
 */
export class SecurityContext {
  private readonly key: Buffer;
  private readonly salt: Buffer;

  constructor(key: Uint8Array, salt: Uint8Array) {
    if (key.length !== KEY_LENGTH) {
      throw new CryptoError(`Key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    if (salt.length === 0) {
      throw new CryptoError('Obfuscation salt must not be empty');
    }
    this.key = Buffer.from(key);
    this.salt = Buffer.from(salt);
  }

  /** Short non-reversible identifier for logs. */
  get keyFingerprint(): string {
    return createHash('sha256').update(this.key).digest('hex').slice(0, 12);
  }

  obfuscate(data: Uint8Array): Buffer {
    return xorWithSalt(data, this.salt);
  }

  deobfuscate(data: Uint8Array): Buffer {
    return this.obfuscate(data);
  }

  /**
   * Encrypts under a fresh random IV and returns base64(iv || ciphertext).
   */
  encrypt(data: Uint8Array): string {
    const iv = randomBytes(NONCE_LENGTH);
    const cipher = createCipheriv(CIPHER_ALGORITHM, this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
    return Buffer.concat([iv, ciphertext]).toString('base64');
  }

  decrypt(token: string): Buffer {
    if (!BASE64_PATTERN.test(token)) {
      throw new CryptoError('Token is not valid base64');
    }
    const raw = Buffer.from(token, 'base64');
    if (raw.length < NONCE_LENGTH) {
      throw new CryptoError(`Token is ${raw.length} bytes, shorter than the ${NONCE_LENGTH}-byte IV`);
    }
    const iv = raw.subarray(0, NONCE_LENGTH);
    try {
      const decipher = createDecipheriv(CIPHER_ALGORITHM, this.key, iv);
      return Buffer.concat([decipher.update(raw.subarray(NONCE_LENGTH)), decipher.final()]);
    } catch (err) {
      throw new CryptoError('Decryption failed', { cause: err });
    }
  }
}

/**
 * Decodes externally supplied key material.
 */
export function decodeKey(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!BASE64_ANY_PATTERN.test(trimmed)) {
    throw new CryptoError('AES key must be base64 or base64url encoded');
  }
  // Node's base64 decoder accepts both alphabets.
  const key = Buffer.from(trimmed, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new CryptoError(`AES key must decode to ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  return key;
}

export function generateKey(): string {
  return randomBytes(KEY_LENGTH).toString('base64');
}

/**
 * Builds the context from configuration, generating a key from the CSPRNG when
 * none is supplied.
 */
export function createSecurityContext(options: SecurityOptions): SecurityContext {
  const key = options.aesKey ? decodeKey(options.aesKey) : randomBytes(KEY_LENGTH);
  return new SecurityContext(key, Buffer.from(options.obfuscationSalt, 'utf-8'));
}
