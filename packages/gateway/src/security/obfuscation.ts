/**
 * @file packages/gateway/src/security/obfuscation.ts
 * @description Reversible XOR-with-salt scrambling applied before encryption.
 */

/**
 * XORs every byte of `data` with the salt, cycling the salt when it is shorter.
 * The transform is its own inverse.
 */
export function xorWithSalt(data: Uint8Array, salt: Uint8Array): Buffer {
  if (salt.length === 0) {
    throw new RangeError('Obfuscation salt must not be empty');
  }
  const out = Buffer.allocUnsafe(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ salt[i % salt.length];
  }
  return out;
}
