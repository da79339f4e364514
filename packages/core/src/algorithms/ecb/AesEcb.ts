import { ecb } from '@noble/ciphers/aes.js';

/**
 * AES-128-ECB with PKCS#7, the only block mode the container uses.
 * Both calls throw whatever `@noble/ciphers` raises on bad length or
 * padding; callers map that onto their own error type.
 */
export function ecbEncrypt(key: Uint8Array, plain: Uint8Array): Uint8Array {
  return ecb(key).encrypt(plain);
}

export function ecbDecrypt(key: Uint8Array, cipher: Uint8Array): Uint8Array {
  return ecb(key).decrypt(cipher);
}
