/**
 * @file packages/gateway/src/security/security-context.test.ts
 * @description Obfuscation and encryption layer tests.
 */

import { describe, it, expect } from 'vitest';
import { KEY_LENGTH, NONCE_LENGTH } from '@fieldlink/shared';
import { CryptoError } from '../domain/errors/app-error.js';
import { createSecurityContext, decodeKey, generateKey, SecurityContext } from './security-context.js';
import { xorWithSalt } from './obfuscation.js';
import { makeSecurity, TEST_KEY } from '../testing/fixtures.js';

describe('xorWithSalt', () => {
  it('should cycle the salt over longer data', () => {
    const out = xorWithSalt(Buffer.from([0x00, 0x01, 0x02]), Buffer.from([0xff, 0x0f]));
    expect([...out]).toEqual([0xff, 0x0e, 0xfd]);
  });

  it('should reject an empty salt', () => {
    expect(() => xorWithSalt(Buffer.from('x'), Buffer.alloc(0))).toThrow(RangeError);
  });
});

describe('SecurityContext', () => {
  const security = makeSecurity();

  describe('obfuscate', () => {
    it('should round-trip arbitrary bytes', () => {
      const samples = [Buffer.alloc(0), Buffer.from('a'), Buffer.from('sensor:voltage=120.5'), Buffer.alloc(300, 0xab)];
      for (const data of samples) {
        expect(security.deobfuscate(security.obfuscate(data))).toEqual(data);
      }
    });

    it('should use the same transform in both directions', () => {
      const data = Buffer.from('LORA:payload');
      expect(security.deobfuscate(data)).toEqual(security.obfuscate(data));
    });

    it('should zero bytes that equal the salt', () => {
      expect([...security.obfuscate(Buffer.from('test'))]).toEqual([0, 0, 0, 0]);
    });
  });

  describe('encrypt', () => {
    it('should round-trip arbitrary bytes', () => {
      const samples = [Buffer.alloc(0), Buffer.from('x'), Buffer.from('{"agent_id":"A"}'), Buffer.alloc(1024, 0x5a)];
      for (const data of samples) {
        expect(security.decrypt(security.encrypt(data))).toEqual(data);
      }
    });

    it('should produce a fresh token per call for the same plaintext', () => {
      const data = Buffer.from('same plaintext');
      const first = security.encrypt(data);
      const second = security.encrypt(data);

      expect(first).not.toBe(second);
      expect(Buffer.from(first, 'base64').subarray(0, NONCE_LENGTH)).not.toEqual(
        Buffer.from(second, 'base64').subarray(0, NONCE_LENGTH),
      );
      expect(security.decrypt(first)).toEqual(data);
      expect(security.decrypt(second)).toEqual(data);
    });

    it('should emit base64(iv || ciphertext) with a stream-sized ciphertext', () => {
      const token = security.encrypt(Buffer.from('12345'));
      expect(Buffer.from(token, 'base64')).toHaveLength(NONCE_LENGTH + 5);
    });
  });

  describe('decrypt', () => {
    it('should reject a token shorter than the IV', () => {
      const short = Buffer.alloc(NONCE_LENGTH - 1).toString('base64');
      expect(() => security.decrypt(short)).toThrow(CryptoError);
    });

    it('should reject text that is not base64', () => {
      expect(() => security.decrypt('not base64!')).toThrow(CryptoError);
      expect(() => security.decrypt('abc')).toThrow(CryptoError);
    });

    it('should accept a bare IV as an empty message', () => {
      expect(security.decrypt(Buffer.alloc(NONCE_LENGTH).toString('base64'))).toHaveLength(0);
    });

    it('should not recover plaintext under a different key', () => {
      const other = new SecurityContext(Buffer.alloc(KEY_LENGTH, 9), Buffer.from('test-salt'));
      const data = Buffer.from('confidential reading');
      expect(other.decrypt(security.encrypt(data))).not.toEqual(data);
    });
  });

  it('should reject keys of the wrong size', () => {
    expect(() => new SecurityContext(Buffer.alloc(16), Buffer.from('s'))).toThrow(CryptoError);
    expect(() => new SecurityContext(TEST_KEY, Buffer.alloc(0))).toThrow(CryptoError);
  });

  it('should copy key material on construction', () => {
    const key = Buffer.alloc(KEY_LENGTH, 1);
    const ctx = new SecurityContext(key, Buffer.from('s'));
    const token = ctx.encrypt(Buffer.from('abc'));
    key.fill(2);
    expect(ctx.decrypt(token).toString()).toBe('abc');
  });
});

describe('key material', () => {
  it('should decode base64 and base64url keys', () => {
    const key = Buffer.alloc(KEY_LENGTH, 0xfb);
    expect(decodeKey(key.toString('base64'))).toEqual(key);
    expect(decodeKey(key.toString('base64url'))).toEqual(key);
  });

  it('should reject keys that do not decode to 32 bytes', () => {
    expect(() => decodeKey(Buffer.alloc(16).toString('base64'))).toThrow(CryptoError);
    expect(() => decodeKey('###')).toThrow(CryptoError);
  });

  it('should generate 32-byte keys', () => {
    expect(Buffer.from(generateKey(), 'base64')).toHaveLength(KEY_LENGTH);
  });

  it('should build a context from configured key material', () => {
    const aesKey = TEST_KEY.toString('base64');
    const a = createSecurityContext({ aesKey, obfuscationSalt: 'test-salt' });
    const b = createSecurityContext({ aesKey, obfuscationSalt: 'test-salt' });
    expect(a.keyFingerprint).toBe(b.keyFingerprint);
    expect(b.decrypt(a.encrypt(Buffer.from('shared')))).toEqual(Buffer.from('shared'));
  });

  it('should generate a distinct key when none is configured', () => {
    const a = createSecurityContext({ obfuscationSalt: 'test-salt' });
    const b = createSecurityContext({ obfuscationSalt: 'test-salt' });
    expect(a.keyFingerprint).toHaveLength(12);
    expect(a.keyFingerprint).not.toBe(b.keyFingerprint);
  });
});
